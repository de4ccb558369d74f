import {
  type ChatStreamClient,
  type Logger,
  describeFailure
} from '@chatprobe/core';

import { type ConversationSession } from '../session';
import { buildCommandRegistry, buildHelpText, type LoopCommandRegistry } from './commands';

export interface LoopIO {
  lines: AsyncIterable<string>;
  write: (text: string) => void;
}

export interface InteractiveLoopOptions {
  client         : ChatStreamClient;
  session        : ConversationSession;
  systemPrompt   : string;
  io             : LoopIO;
  logger         : Logger;
  commands?      : LoopCommandRegistry;
  userLabel?     : string;
  assistantLabel?: string;
}

export type LoopExit = 'quit' | 'end_of_input';

/**
 * Line-oriented chat. Each non-command line is one user turn; a failed
 * exchange is printed and rolled back so the history never holds a user
 * message without its reply.
 */
export class InteractiveLoop {
  private readonly options: InteractiveLoopOptions;
  private readonly commands: LoopCommandRegistry;
  private readonly logger: Logger;

  public constructor(options: InteractiveLoopOptions) {
    this.options = options;
    this.commands = options.commands ?? buildCommandRegistry();
    this.logger = options.logger.child({ component: 'chat' });
  }

  public async run(): Promise<LoopExit> {
    const { io } = this.options;
    const userLabel = this.options.userLabel ?? 'You';
    const lines = io.lines[Symbol.asyncIterator]();

    while (true) {
      io.write(`${userLabel}: `);
      const next = await lines.next();
      if (next.done) {
        return 'end_of_input';
      }

      const input = next.value.trim();
      if (!input) continue;

      const command = this.commands.get(input.toLowerCase());
      if (command) {
        const result = command.handler({
          session: this.options.session,
          print: (line) => io.write(`${line}\n`),
          helpText: () => buildHelpText(this.commands)
        });
        this.logger.debug({ command: input.toLowerCase() }, 'command handled');
        if (result === 'quit') {
          await lines.return?.();
          return 'quit';
        }
        continue;
      }

      await this.exchange(input);
    }
  }

  private async exchange(input: string): Promise<void> {
    const { client, session, systemPrompt, io } = this.options;
    const assistantLabel = this.options.assistantLabel ?? 'Assistant';

    session.appendUser(input);
    const outcome = await client.send(session.buildRequestPayload(systemPrompt));

    if (outcome.status === 'error') {
      session.rollbackLastUserTurn();
      io.write(`${assistantLabel}: ${describeFailure(outcome)}\n`);
      this.logger.info({ kind: outcome.error.kind, historyLength: session.length }, 'turn rolled back');
      return;
    }

    const { result } = outcome;
    session.appendAssistant(result.text);
    io.write(`${assistantLabel}: ${result.text}\n`);
    io.write(
      `      [TTFT ${result.timeToFirstTokenMs.toFixed(0)} ms | total ${result.totalMs.toFixed(0)} ms | ${session.turnCount} turns]\n\n`
    );
  }
}
