/**
 * Factory function to create a Phaser game instance for Klondike.
 */
import Phaser from 'phaser';
import { GAME_H, GAME_W, TABLE_COLOR } from '../../src/ui/constants';
import { KlondikeScene } from './scenes/KlondikeScene';

export interface KlondikeGameOptions {
  /** DOM element ID to parent the game canvas to. Default: 'game-container' */
  parent?: string;
  /** Game width in pixels. Default: GAME_W */
  width?: number;
  /** Game height in pixels. Default: GAME_H */
  height?: number;
}

export function createKlondikeGame(options: KlondikeGameOptions = {}): Phaser.Game {
  const {
    parent = 'game-container',
    width = GAME_W,
    height = GAME_H,
  } = options;

  const config: Phaser.Types.Core.GameConfig = {
    type: Phaser.AUTO,
    parent,
    width,
    height,
    backgroundColor: TABLE_COLOR,
    scene: [KlondikeScene],
    scale: {
      mode: Phaser.Scale.FIT,
      autoCenter: Phaser.Scale.CENTER_BOTH,
    },
    render: {
      roundPixels: true,
    },
  };

  return new Phaser.Game(config);
}
