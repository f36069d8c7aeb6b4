/**
 * UI Module
 *
 * Shared presentation helpers: layout constants, card face labels and
 * modal overlays.
 */
export const UI_VERSION = '0.1.0';

// Shared constants
export {
  CARD_W,
  CARD_H,
  GAME_W,
  GAME_H,
  FONT_FAMILY,
  TABLE_COLOR,
  CARD_FACE_COLOR,
  CARD_BACK_COLOR,
  SLOT_OUTLINE_COLOR,
  CURSOR_COLOR,
  PICKED_COLOR,
} from './constants';

// Card faces
export {
  CARD_BACK_LABEL,
  RED_TEXT,
  BLACK_TEXT,
  cardFaceLabel,
  cardFaceColor,
  emptyPileLabel,
} from './CardFaceHelpers';

// Overlay system
export {
  createOverlay,
  addOverlayText,
  addOverlayOption,
  dismissOverlay,
  OVERLAY_OPTION_COLOR,
  OVERLAY_OPTION_HOVER_COLOR,
} from './Overlay';
export type { Overlay, OverlayOptions, OverlayTextStyle } from './Overlay';
