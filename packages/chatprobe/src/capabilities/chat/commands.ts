import { type ConversationSession } from '../session';

export type CommandResult = 'continue' | 'quit';

export interface LoopCommandContext {
  session : ConversationSession;
  print   : (line: string) => void;
  /** Lines describing every registered command. */
  helpText: () => string;
}

export interface LoopCommand {
  description: string;
  handler: (ctx: LoopCommandContext) => CommandResult;
}

export type LoopCommandRegistry = Map<string, LoopCommand>;

export const builtins = {
  quit: {
    description: 'End the conversation',
    handler: (ctx) => {
      ctx.print('[Exiting chat]');
      return 'quit';
    }
  },
  reset: {
    description: 'Clear conversation history and start fresh',
    handler: (ctx) => {
      ctx.session.reset();
      ctx.print('[History cleared]\n');
      return 'continue';
    }
  },
  help: {
    description: 'Show this message',
    handler: (ctx) => {
      ctx.print(ctx.helpText());
      return 'continue';
    }
  }
} satisfies Record<string, LoopCommand>;

export function buildCommandRegistry(extra: Record<string, LoopCommand> = {}): LoopCommandRegistry {
  const registry: LoopCommandRegistry = new Map();

  for (const [name, command] of Object.entries({ ...builtins, ...extra })) {
    registry.set(name.toLowerCase(), command);
  }

  return registry;
}

export function buildHelpText(registry: LoopCommandRegistry): string {
  const width = Math.max(...[...registry.keys()].map((name) => name.length));
  const lines = ['Commands:'];
  for (const [name, command] of registry.entries()) {
    lines.push(`  ${name.padEnd(width)}  ${command.description}`);
  }
  lines.push('Anything else is sent as your next message.\n');
  return lines.join('\n');
}
