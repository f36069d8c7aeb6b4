/**
 * Modal overlays: a full-screen input-blocking backdrop with a centred
 * panel, lines of text and clickable options.
 *
 * Used for the start screen, the game menu, help and the victory
 * screen. Every created object is tracked on the returned
 * {@link Overlay} so it can be dismissed in one call.
 */

import { FONT_FAMILY, GAME_H, GAME_W } from './constants';

// ── Types ───────────────────────────────────────────────────

export interface OverlayOptions {
  /** Display depth of the backdrop; content sits one above. Default: 10. */
  depth?: number;
  /** Panel width in pixels. Default: 520. */
  panelWidth?: number;
  /** Panel height in pixels. Default: 360. */
  panelHeight?: number;
  /** Backdrop alpha. Default: 0.6. */
  backdropAlpha?: number;
  /** Viewport width. Default: GAME_W. */
  width?: number;
  /** Viewport height. Default: GAME_H. */
  height?: number;
}

export interface OverlayTextStyle {
  /** Default: '16px'. */
  fontSize?: string;
  /** Default: '#ffffff'. */
  color?: string;
}

export interface Overlay {
  readonly depth: number;
  /** Centre of the viewport. */
  readonly centerX: number;
  readonly centerY: number;
  /** Everything created for this overlay, for {@link dismissOverlay}. */
  readonly objects: Phaser.GameObjects.GameObject[];
}

// ── Defaults ────────────────────────────────────────────────

export const OVERLAY_OPTION_COLOR = '#88ff88';
export const OVERLAY_OPTION_HOVER_COLOR = '#aaffaa';

// ── Factory ─────────────────────────────────────────────────

/**
 * Create the backdrop and panel. The backdrop is interactive so clicks
 * do not reach the board beneath it.
 */
export function createOverlay(
  scene: Phaser.Scene,
  options: OverlayOptions = {},
): Overlay {
  const {
    depth = 10,
    panelWidth = 520,
    panelHeight = 360,
    backdropAlpha = 0.6,
    width = GAME_W,
    height = GAME_H,
  } = options;

  const centerX = width / 2;
  const centerY = height / 2;

  const backdrop = scene.add.rectangle(centerX, centerY, width, height, 0x000000, backdropAlpha);
  backdrop.setDepth(depth);
  backdrop.setInteractive();

  const panel = scene.add.rectangle(centerX, centerY, panelWidth, panelHeight, 0x102010, 0.92);
  panel.setDepth(depth);
  panel.setStrokeStyle(2, 0x448844);

  return { depth, centerX, centerY, objects: [backdrop, panel] };
}

/**
 * Add a centred line of text, `offsetY` pixels from the overlay centre.
 */
export function addOverlayText(
  scene: Phaser.Scene,
  overlay: Overlay,
  offsetY: number,
  text: string,
  style: OverlayTextStyle = {},
): Phaser.GameObjects.Text {
  const { fontSize = '16px', color = '#ffffff' } = style;
  const line = scene.add
    .text(overlay.centerX, overlay.centerY + offsetY, text, {
      fontSize,
      color,
      fontFamily: FONT_FAMILY,
      align: 'center',
    })
    .setOrigin(0.5)
    .setDepth(overlay.depth + 1);
  overlay.objects.push(line);
  return line;
}

/**
 * Add a clickable option, e.g. `[Y] New game`. Hovering highlights it.
 */
export function addOverlayOption(
  scene: Phaser.Scene,
  overlay: Overlay,
  offsetY: number,
  label: string,
  onSelect: () => void,
): Phaser.GameObjects.Text {
  const option = addOverlayText(scene, overlay, offsetY, label, {
    fontSize: '18px',
    color: OVERLAY_OPTION_COLOR,
  });
  option.setInteractive({ useHandCursor: true });
  option.on('pointerover', () => option.setColor(OVERLAY_OPTION_HOVER_COLOR));
  option.on('pointerout', () => option.setColor(OVERLAY_OPTION_COLOR));
  option.on('pointerdown', onSelect);
  return option;
}

// ── Cleanup ─────────────────────────────────────────────────

/** Destroy every object of an overlay and forget them. */
export function dismissOverlay(overlay: Overlay): void {
  for (const obj of overlay.objects) {
    obj.destroy();
  }
  overlay.objects.length = 0;
}
