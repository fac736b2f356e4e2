#!/usr/bin/env node
/**
 * CLI entry point for gridloop
 *
 * Node terminal adapter: stdin keystrokes feed the scheduler's input
 * snapshot and stdout stands in for an xterm.js Terminal, so frames are
 * painted by the same TerminalRenderer a browser terminal would use.
 */

import { parseCliArgs, type CliArgs } from './args';
import { FRAME_LIMIT_ENV, GridLoopError, InputSnapshot, type SchedulerStats } from './engine';
import { games, launchGame, type GameInfo } from './games';
import { attachKeyboard } from './keyboard';
import { pickGame } from './picker';
import { TerminalRenderer, type TerminalSurface } from './renderers';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends TerminalSurface {
  element: object | null;
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

const decoder = new TextDecoder();

function createNodeTerminal(): NodeTerminal {
  return {
    write: (data: string | Uint8Array) => {
      const text = typeof data === 'string' ? data : decoder.decode(data);
      process.stdout.write(SYNC_START + text + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    element: {}, // Truthy for isTerminalValid check
  };
}

function restoreStdin() {
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }
  process.stdin.pause();
}

// ---------------------------------------------------------------------------
// Game lifecycle
// ---------------------------------------------------------------------------

async function play(info: GameInfo, args: CliArgs): Promise<SchedulerStats> {
  const terminal = createNodeTerminal();
  const input = new InputSnapshot();
  const scheduler = launchGame(info, {
    renderer: new TerminalRenderer(terminal),
    input,
    fps: args.fps,
    frameLimit: args.frames,
    warmupMs: args.warmupMs,
    encoding: args.encoding,
  });

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  const quit = () => scheduler.quit();
  const detach = attachKeyboard(process.stdin, input, { onInterrupt: quit });
  process.on('SIGINT', quit);
  process.on('SIGTERM', quit);
  // Last resort if something exits the process mid-game
  process.on('exit', restoreStdin);

  try {
    return await scheduler.start();
  } finally {
    detach();
    process.off('SIGINT', quit);
    process.off('SIGTERM', quit);
    process.off('exit', restoreStdin);
    restoreStdin();
  }
}

function findGame(name: string): GameInfo | undefined {
  return games.find(g => g.id === name || g.name.toLowerCase() === name.toLowerCase());
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  gridloop — Frame-paced grid games in the terminal

  Usage:
    gridloop                     Pick a game
    gridloop <game>              Launch a game directly
    gridloop --list              List all games
    gridloop --help              Show this help

  Options:
    --fps <n>                    Target frames per second (default 30)
    --frames <n>                 Stop after n frames
    --warmup <ms>                Delay before the first frame (default 1000)
    --rle                        Run-length encode frames

  Environment:
    ${FRAME_LIMIT_ENV}=<n>       Same as --frames, unless --frames is given

  Games:
    ${games.map(g => `${g.id.padEnd(16)} ${g.description}`).join('\n    ')}

  Controls:
    Arrow keys / WASD    Move
    Space                Action
    Q / ESC              Quit

  Examples:
    gridloop snake
    gridloop sketch --fps 60
`);
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof GridLoopError) {
      console.error(error.message);
      console.error('Run gridloop --help for usage.');
      return 1;
    }
    throw error;
  }

  if (args.help) {
    printHelp();
    return 0;
  }

  if (args.list) {
    for (const game of games) {
      console.log(`  ${game.id.padEnd(16)} ${game.description}`);
    }
    return 0;
  }

  let info: GameInfo | undefined;
  if (args.game) {
    info = findGame(args.game);
    if (!info) {
      console.error(`Unknown game: ${args.game}`);
      console.error(`Available games: ${games.map(g => g.id).join(', ')}`);
      return 1;
    }
  } else {
    info = await pickGame();
    if (!info) return 0;
  }

  try {
    const stats = await play(info, args);
    console.log(`${info.name}: ${stats.frames} frames, ${stats.droppedFrames} dropped (${stats.stopReason})`);
    return stats.stopReason === 'connection-lost' ? 1 : 0;
  } catch (error) {
    if (error instanceof GridLoopError) {
      console.error(`[gridloop] ${error.code}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[gridloop] Unexpected error:', error);
    process.exitCode = 1;
  }
);
