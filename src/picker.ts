/**
 * Interactive game picker
 */

import * as p from '@clack/prompts';
import { games, getGame, type GameInfo } from './games';

interface GameOption {
  value: string;
  label: string;
  hint: string;
}

/**
 * @returns undefined when the prompt is cancelled
 */
export async function pickGame(): Promise<GameInfo | undefined> {
  p.intro('gridloop');
  const selected = await p.select<GameOption[], string>({
    message: 'Pick a game',
    options: games.map(g => ({ value: g.id, label: g.name, hint: g.description })),
  });

  if (p.isCancel(selected)) {
    p.cancel('Cancelled.');
    return undefined;
  }
  p.outro(`Starting ${selected}...`);
  return getGame(selected);
}
