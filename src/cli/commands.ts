/**
 * Parsing of chat-loop input: slash commands or a message to send
 */

import type { ModelParameters } from '../types/index.js';

export type Command =
  | { kind: 'exit' }
  | { kind: 'help' }
  | { kind: 'new' }
  | { kind: 'list' }
  | { kind: 'load'; sessionId: string }
  | { kind: 'title'; title: string }
  | { kind: 'set'; patch: Partial<ModelParameters> }
  | { kind: 'archive' }
  | { kind: 'message'; text: string }
  | { kind: 'empty' }
  | { kind: 'invalid'; reason: string };

export const HELP_TEXT = [
  'Commands:',
  '  /new                 start a new conversation',
  '  /list                list saved conversations',
  '  /load <id>           continue a saved conversation',
  '  /title <text>        rename the current conversation',
  '  /set <field> <value> change model, temperature, maxTokens, contextWindow, recencyWindow or directive',
  '  /archive             close the current conversation',
  '  exit                 quit'
].join('\n');

function toPatch(field: string, value: string): Partial<ModelParameters> | string {
  const number = Number(value);
  const numeric = value !== '' && Number.isFinite(number);

  switch (field) {
    case 'model':
      return { model: value };
    case 'directive':
      return { systemDirective: value };
    case 'temperature':
      return numeric ? { temperature: number } : 'temperature must be a number';
    case 'maxtokens':
      return numeric ? { maxTokens: number } : 'maxTokens must be a number';
    case 'contextwindow':
      return numeric ? { contextWindow: number } : 'contextWindow must be a number';
    case 'recencywindow':
      return numeric ? { recencyWindow: number } : 'recencyWindow must be a number';
    default:
      return `Unknown field: ${field}`;
  }
}

function parseSet(args: string): Command {
  const match = /^(\S+)\s+([\s\S]+)$/.exec(args);
  if (!match) {
    return { kind: 'invalid', reason: 'Usage: /set <field> <value>' };
  }
  const patch = toPatch(match[1].toLowerCase(), match[2].trim());
  return typeof patch === 'string' ? { kind: 'invalid', reason: patch } : { kind: 'set', patch };
}

export function parseCommand(input: string): Command {
  const line = input.trim();
  if (!line) return { kind: 'empty' };
  if (line.toLowerCase() === 'exit') return { kind: 'exit' };
  if (!line.startsWith('/')) return { kind: 'message', text: line };

  const [, name = '', rest = ''] = /^\/(\S+)\s*([\s\S]*)$/.exec(line) ?? [];
  const args = rest.trim();

  switch (name.toLowerCase()) {
    case 'help':
      return { kind: 'help' };
    case 'new':
      return { kind: 'new' };
    case 'list':
      return { kind: 'list' };
    case 'archive':
      return { kind: 'archive' };
    case 'load':
      return args ? { kind: 'load', sessionId: args } : { kind: 'invalid', reason: 'Usage: /load <id>' };
    case 'title':
      return args ? { kind: 'title', title: args } : { kind: 'invalid', reason: 'Usage: /title <text>' };
    case 'set':
      return parseSet(args);
    default:
      return { kind: 'invalid', reason: `Unknown command: /${name}` };
  }
}
