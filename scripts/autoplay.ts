#!/usr/bin/env node
/**
 * Autoplay Tool -- plays a batch of seeded deals with the greedy
 * strategy and reports how many were won.
 *
 * Usage:
 *   npm run autoplay -- [--games <n>] [--seed <s>] [--mode draw-one|draw-three]
 *
 * Deal `i` uses seed `s + i`, so a run is reproducible and any single
 * deal can be opened in the browser with `?seed=<s + i>`.
 */

import { createSeededRng } from '../src/card-system/Deck';
import { GreedyStrategy, playGame } from '../games/klondike/AutoPlayer';
import type { PlayResult } from '../games/klondike/AutoPlayer';
import { newGame } from '../games/klondike/KlondikeRules';
import type { GameMode } from '../games/klondike/KlondikeState';
import { GAME_MODES } from '../games/klondike/KlondikeState';

const TAG = '[autoplay]';

interface AutoplayArgs {
  games: number;
  seed: number;
  mode: GameMode;
}

function isGameMode(value: string): value is GameMode {
  return (GAME_MODES as readonly string[]).includes(value);
}

function parseArgs(): AutoplayArgs {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    console.log(`
Usage: npm run autoplay -- [--games <n>] [--seed <s>] [--mode draw-one|draw-three]

Options:
  --games <n>   Number of deals to play (default: 100)
  --seed <s>    Seed of the first deal (default: 1)
  --mode <m>    draw-one or draw-three (default: draw-one)
`);
    process.exit(0);
  }

  const parsed: AutoplayArgs = { games: 100, seed: 1, mode: 'draw-one' };

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1] ?? '';
    switch (args[i]) {
      case '--games':
        parsed.games = parseInt(value, 10);
        i++;
        break;
      case '--seed':
        parsed.seed = parseInt(value, 10);
        i++;
        break;
      case '--mode':
        if (!isGameMode(value)) {
          console.error(`${TAG} Error: unknown mode "${value}".`);
          process.exit(1);
        }
        parsed.mode = value;
        i++;
        break;
      default:
        console.error(`${TAG} Error: unknown argument "${args[i]}".`);
        process.exit(1);
    }
  }

  if (!Number.isInteger(parsed.games) || parsed.games < 1) {
    console.error(`${TAG} Error: --games must be a positive integer.`);
    process.exit(1);
  }
  if (!Number.isInteger(parsed.seed)) {
    console.error(`${TAG} Error: --seed must be an integer.`);
    process.exit(1);
  }
  return parsed;
}

function main(): void {
  const { games, seed, mode } = parseArgs();
  console.log(`${TAG} Playing ${games} ${mode} deals from seed ${seed} (${GreedyStrategy.name})`);

  const results: PlayResult[] = [];
  for (let i = 0; i < games; i++) {
    const state = newGame(mode, createSeededRng(seed + i));
    const result = playGame(state, GreedyStrategy);
    results.push(result);
    if (result.won) {
      console.log(`${TAG}   seed ${seed + i}: won in ${result.steps} steps`);
    }
  }

  const won = results.filter((r) => r.won).length;
  const stalled = results.filter((r) => r.endReason === 'stalled' || r.endReason === 'stuck').length;
  const pct = ((won / games) * 100).toFixed(1);
  console.log(`${TAG} Won ${won} / ${games} (${pct}%), ${stalled} stalled`);
}

main();
