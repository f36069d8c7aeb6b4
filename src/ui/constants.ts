/**
 * Shared UI constants.
 *
 * Default rendering dimensions, colours and font settings for the
 * board scene. Scene-specific spacing lives beside the scene.
 */

/** Card width (pixels). */
export const CARD_W = 72;

/** Card height (pixels). */
export const CARD_H = 100;

/** Game viewport width (pixels). */
export const GAME_W = 1280;

/** Game viewport height (pixels). */
export const GAME_H = 720;

/** Default font family used for in-game text. */
export const FONT_FAMILY = 'Arial, sans-serif';

/** Table felt colour. */
export const TABLE_COLOR = '#2d572c';

/** Face-up card fill. */
export const CARD_FACE_COLOR = 0xf8f8f0;

/** Face-down card fill. */
export const CARD_BACK_COLOR = 0x2a4d8f;

/** Outline of an empty slot. */
export const SLOT_OUTLINE_COLOR = 0x448844;

/** Outline around the cursor's cards. */
export const CURSOR_COLOR = 0xffdd44;

/** Outline around picked-up cards. */
export const PICKED_COLOR = 0x44ddff;
