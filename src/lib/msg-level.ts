/**
 * msg-level parsing
 *
 * The player's msg-level option is a list of module=level pairs. Over JSON
 * IPC it arrives as a map ({"all": "v", "notification_osd": "debug"}); in its
 * option-string form as "all=v,notification_osd=debug". The last pair naming
 * this client (or "all") decides our level.
 */

import { isNodeMap, type NodeValue } from '../types/signals';

export type LogLevel = 'quiet' | 'error' | 'verbose' | 'debug';

export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  quiet: 0,
  error: 1,
  verbose: 2,
  debug: 3
};

export function parseMsgLevel(msgLevel: NodeValue | undefined, clientName: string): LogLevel {
  let value: string | null = null;

  for (const [module, level] of msgLevelPairs(msgLevel)) {
    if (module === clientName || module === 'all') {
      value = level;
    }
  }

  switch (value) {
    case 'no': return 'quiet';
    case 'v': return 'verbose';
    case 'debug':
    case 'trace': return 'debug';
    default: return 'error';
  }
}

function msgLevelPairs(msgLevel: NodeValue | undefined): Array<[string, string]> {
  if (typeof msgLevel === 'string') {
    const pairs: Array<[string, string]> = [];
    for (const token of msgLevel.split(',')) {
      const [module, level] = token.split('=');
      if (level !== undefined) pairs.push([module, level]);
    }
    return pairs;
  }

  if (isNodeMap(msgLevel)) {
    const pairs: Array<[string, string]> = [];
    for (const [module, level] of Object.entries(msgLevel)) {
      if (typeof level === 'string') pairs.push([module, level]);
    }
    return pairs;
  }

  return [];
}
