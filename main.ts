/**
 * Klondike -- browser entry point.
 *
 * Boots a single Phaser.Game running the Klondike scene. Query
 * parameters (`?seed=`, `?mode=`, `?debug=`) are read by the scene.
 */
import { createKlondikeGame } from './games/klondike/createKlondikeGame';

const game = createKlondikeGame();

// Expose for debugging from the console
(window as unknown as Record<string, unknown>).__PHASER_GAME__ = game;
