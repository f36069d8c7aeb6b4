/**
 * KlondikeScene -- the Phaser scene for Klondike.
 *
 * Features:
 *   - Start screen choosing draw-one or draw-three
 *   - Deck (stock and fanned waste), 7 cascading columns, 4 foundations
 *   - Keyboard cursor with run extension; picked-up cards outlined
 *   - Status, context help and debug indicator lines
 *   - Game menu, help and victory overlays
 *
 * All rules live in {@link KlondikeSession}; the scene only maps keys to
 * commands and redraws the board after each one.
 */

import Phaser from 'phaser';
import type { Card } from '../../../src/card-system/Card';
import {
  CARD_BACK_COLOR,
  CARD_FACE_COLOR,
  CARD_H,
  CARD_W,
  CURSOR_COLOR,
  FONT_FAMILY,
  GAME_H,
  PICKED_COLOR,
  SLOT_OUTLINE_COLOR,
  TABLE_COLOR,
} from '../../../src/ui/constants';
import {
  CARD_BACK_LABEL,
  cardFaceColor,
  cardFaceLabel,
  emptyPileLabel,
} from '../../../src/ui/CardFaceHelpers';
import type { Overlay } from '../../../src/ui/Overlay';
import {
  addOverlayOption,
  addOverlayText,
  createOverlay,
  dismissOverlay,
} from '../../../src/ui/Overlay';
import { parseGameConfig } from '../GameConfig';
import type { KeyCommand } from '../KeyBindings';
import { HELP_LINES, commandForKey } from '../KeyBindings';
import {
  columnCardPosition,
  pilePosition,
  selectionBounds,
  stockPosition,
  wastePosition,
} from '../KlondikeLayout';
import { visibleWaste } from '../KlondikeRules';
import { KlondikeSession } from '../KlondikeSession';
import type { GameMode } from '../KlondikeState';
import type { Selection } from '../Selection';

// ── Constants ───────────────────────────────────────────────

const TAG = '[KlondikeScene]';
const CARD_RADIUS = 6;
const HUD_X = 20;

const MODE_NAME: Record<GameMode, string> = {
  'draw-one': 'Draw one',
  'draw-three': 'Draw three',
};

// ── Scene ───────────────────────────────────────────────────

export class KlondikeScene extends Phaser.Scene {
  private session!: KlondikeSession;
  private seed: number = Date.now();

  // Redrawn after every command
  private boardObjects: Phaser.GameObjects.GameObject[] = [];
  private overlay: Overlay | null = null;
  private helpOpen: boolean = false;

  // HUD
  private titleText!: Phaser.GameObjects.Text;
  private statusText!: Phaser.GameObjects.Text;
  private contextText!: Phaser.GameObjects.Text;
  private debugText!: Phaser.GameObjects.Text;

  constructor() {
    super({ key: 'KlondikeScene' });
  }

  // ── Create ──────────────────────────────────────────────

  create(): void {
    this.cameras.main.setBackgroundColor(TABLE_COLOR);

    const config = parseGameConfig(window.location.search);
    for (const warning of config.warnings) {
      console.warn(`${TAG} ${warning}`);
    }
    this.seed = config.seed;

    this.session = new KlondikeSession({
      mode: config.mode,
      debugMode: config.debugMode,
      seed: config.seed,
    });
    this.boardObjects = [];
    this.overlay = null;
    this.helpOpen = false;

    this.session.events.on('game-started', ({ mode, restarted }) => {
      console.info(`${TAG} ${restarted ? 'Restarted' : 'New'} game (${mode})`);
    });
    this.session.events.on('game-won', ({ turnNumber }) => {
      console.info(`${TAG} Victory after ${turnNumber} turns`);
    });
    this.session.events.on('phase-changed', ({ to }) => {
      if (to === 'quit') console.info(`${TAG} Session ended`);
    });

    this.createHud();
    this.setupKeyboard();
    this.render();
  }

  // ── Input ───────────────────────────────────────────────

  private setupKeyboard(): void {
    if (!this.input.keyboard) return;

    this.input.keyboard.on('keydown', (event: KeyboardEvent) => {
      // Any key closes the help overlay.
      if (this.helpOpen) {
        this.helpOpen = false;
        this.render();
        return;
      }

      const command = commandForKey(this.session.phase, event.key);
      if (!command) return;
      event.preventDefault();
      this.execute(command);
    });
  }

  private execute(command: KeyCommand): void {
    switch (command.kind) {
      case 'action':
        this.session.handle(command.action);
        break;
      case 'new-game':
        this.session.startNewGame(command.mode ?? this.session.mode);
        break;
      case 'restart':
        this.session.restartGame();
        break;
      case 'toggle-help':
        this.helpOpen = !this.helpOpen;
        break;
    }
    this.render();
  }

  // ── Rendering ───────────────────────────────────────────

  private render(): void {
    this.clearBoard();
    if (this.session.hasGame) {
      this.drawBoard();
    }
    this.refreshHud();
    this.refreshOverlay();
  }

  private clearBoard(): void {
    for (const obj of this.boardObjects) {
      obj.destroy();
    }
    this.boardObjects = [];
  }

  private createHud(): void {
    const style = { fontFamily: FONT_FAMILY, color: '#ffffff' };
    this.titleText = this.add.text(HUD_X, 12, '', { ...style, fontSize: '18px' });
    this.debugText = this.add.text(HUD_X, 36, '', { ...style, fontSize: '14px', color: '#ffaa44' });
    this.statusText = this.add.text(HUD_X, GAME_H - 56, '', { ...style, fontSize: '16px' });
    this.contextText = this.add.text(HUD_X, GAME_H - 30, '', { ...style, fontSize: '14px', color: '#cccccc' });
  }

  private refreshHud(): void {
    const session = this.session;
    this.titleText.setText(
      session.hasGame
        ? `Klondike - ${MODE_NAME[session.mode]} - Seed: ${this.seed}`
        : 'Klondike',
    );
    this.debugText.setText(session.debugMode ? 'DEBUG' : '');
    this.statusText.setText(session.statusMessage);
    this.contextText.setText(
      session.phase === 'game' ? `${session.helpText}   h: Help` : '',
    );
  }

  private drawBoard(): void {
    const state = this.session.state;

    const stock = stockPosition();
    if (state.stock.isEmpty()) {
      this.drawSlot(stock.x, stock.y, '');
    } else {
      this.drawCard(stock.x, stock.y, null);
      this.track(
        this.add
          .text(stock.x, stock.y + CARD_H / 2 + 10, `${state.stock.size()}`, {
            fontSize: '12px',
            color: '#ffffff',
            fontFamily: FONT_FAMILY,
          })
          .setOrigin(0.5),
      );
    }

    const waste = visibleWaste(state);
    if (waste.length === 0) {
      const p = wastePosition(0);
      this.drawSlot(p.x, p.y, '');
    }
    waste.forEach((card, i) => {
      const p = wastePosition(i);
      this.drawCard(p.x, p.y, card);
    });

    state.tableau.forEach((column, col) => {
      const entries = column.toEntries();
      if (entries.length === 0) {
        const p = columnCardPosition(col, 0);
        this.drawSlot(p.x, p.y, 'K');
      }
      entries.forEach((entry, row) => {
        const p = columnCardPosition(col, row);
        this.drawCard(p.x, p.y, entry.state === 'face-up' ? entry.card : null);
      });
    });

    state.foundations.forEach((pile, i) => {
      const p = pilePosition(i);
      const top = pile.peek();
      if (top) {
        this.drawCard(p.x, p.y, top);
      } else {
        this.drawSlot(p.x, p.y, emptyPileLabel(pile.suit));
      }
    });

    if (this.session.phase === 'game') {
      this.drawOutline(this.session.cursor, CURSOR_COLOR, 3);
      const picked = this.session.picked;
      if (picked) this.drawOutline(picked, PICKED_COLOR, 2);
    }
  }

  /** Draw a card; `null` draws its back. */
  private drawCard(x: number, y: number, card: Card | null): void {
    const g = this.add.graphics();
    g.fillStyle(card ? CARD_FACE_COLOR : CARD_BACK_COLOR, 1);
    g.fillRoundedRect(x - CARD_W / 2, y - CARD_H / 2, CARD_W, CARD_H, CARD_RADIUS);
    g.lineStyle(1, 0x000000, 0.5);
    g.strokeRoundedRect(x - CARD_W / 2, y - CARD_H / 2, CARD_W, CARD_H, CARD_RADIUS);
    this.track(g);

    const label = card ? cardFaceLabel(card) : CARD_BACK_LABEL;
    const color = card ? cardFaceColor(card) : '#8fa8d8';
    this.track(
      this.add.text(x - CARD_W / 2 + 6, y - CARD_H / 2 + 4, label, {
        fontSize: '16px',
        color,
        fontFamily: FONT_FAMILY,
      }),
    );
  }

  private drawSlot(x: number, y: number, label: string): void {
    const g = this.add.graphics();
    g.lineStyle(1, SLOT_OUTLINE_COLOR, 0.8);
    g.strokeRoundedRect(x - CARD_W / 2, y - CARD_H / 2, CARD_W, CARD_H, CARD_RADIUS);
    this.track(g);
    if (label) {
      this.track(
        this.add
          .text(x, y, label, { fontSize: '24px', color: '#448844', fontFamily: FONT_FAMILY })
          .setOrigin(0.5),
      );
    }
  }

  private drawOutline(selection: Selection, color: number, width: number): void {
    const b = selectionBounds(selection, this.session.state);
    const g = this.add.graphics();
    g.lineStyle(width, color, 1);
    g.strokeRoundedRect(
      b.x - b.width / 2 - 3,
      b.y - b.height / 2 - 3,
      b.width + 6,
      b.height + 6,
      CARD_RADIUS + 2,
    );
    this.track(g);
  }

  private track(obj: Phaser.GameObjects.GameObject): void {
    this.boardObjects.push(obj);
  }

  // ── Overlays ────────────────────────────────────────────

  private refreshOverlay(): void {
    if (this.overlay) {
      dismissOverlay(this.overlay);
      this.overlay = null;
    }

    switch (this.session.phase) {
      case 'start':
        this.showOverlay('Klondike', ['Choose how many cards each draw turns over.'], [
          ['[1] Draw one', { kind: 'new-game', mode: 'draw-one' }],
          ['[3] Draw three', { kind: 'new-game', mode: 'draw-three' }],
          ['[Esc] Quit', { kind: 'action', action: 'quit' }],
        ]);
        break;
      case 'game':
        if (this.helpOpen) {
          this.showOverlay('Help', HELP_LINES, []);
        }
        break;
      case 'game-menu':
        this.showOverlay('Menu', [], [
          ['[Y] New game', { kind: 'new-game' }],
          ['[R] Restart this deal', { kind: 'restart' }],
          ['[Q] Quit', { kind: 'action', action: 'quit' }],
          ['[N] Back to the game', { kind: 'action', action: 'close-menu' }],
        ]);
        break;
      case 'victory':
        this.showOverlay('Victory!', ['Play again?'], [
          ['[Y] Yes', { kind: 'new-game' }],
          ['[N] No', { kind: 'action', action: 'quit' }],
        ]);
        break;
      case 'quit':
        this.showOverlay('Thanks for playing', ['Reload the page to play again.'], []);
        break;
    }
  }

  private showOverlay(
    title: string,
    lines: readonly string[],
    options: ReadonlyArray<readonly [string, KeyCommand]>,
  ): void {
    const height = 120 + 26 * lines.length + 34 * options.length;
    const overlay = createOverlay(this, { panelHeight: Math.max(200, height) });
    let y = -height / 2 + 40;

    addOverlayText(this, overlay, y, title, { fontSize: '28px', color: '#ffdd44' });
    y += 50;
    for (const line of lines) {
      addOverlayText(this, overlay, y, line);
      y += 26;
    }
    y += 10;
    for (const [label, command] of options) {
      addOverlayOption(this, overlay, y, label, () => this.execute(command));
      y += 34;
    }
    this.overlay = overlay;
  }
}
