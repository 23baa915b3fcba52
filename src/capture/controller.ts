import type { Diagnostics } from '../diagnostics';
import { silentDiagnostics } from '../diagnostics';
import { describeError } from '../errors';
import type { SeatingLayout } from '../seating/layout';
import type { CaptureCommand, CaptureLoop } from './loop';

export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

export type CommandOutcome =
  | { status: 'applied' }
  | { status: 'timeout'; afterMs: number }
  | { status: 'failed'; error: unknown };

/**
 * Control surface for launchers and editors. Commands are marshalled onto the loop and
 * acknowledged once applied; the caller waits at most `timeoutMs`. A timeout is reported
 * as an outcome, and the command may still be applied later.
 */
export class CaptureController {
  constructor(
    private readonly loop: CaptureLoop,
    private readonly diagnostics: Diagnostics = silentDiagnostics
  ) {}

  requestStop(timeoutMs = DEFAULT_COMMAND_TIMEOUT_MS): Promise<CommandOutcome> {
    return this.dispatch({ type: 'stop' }, timeoutMs);
  }

  requestSeatingUpdate(
    layout: SeatingLayout | null,
    timeoutMs = DEFAULT_COMMAND_TIMEOUT_MS
  ): Promise<CommandOutcome> {
    return this.dispatch({ type: 'updateSeating', layout }, timeoutMs);
  }

  private async dispatch(command: CaptureCommand, timeoutMs: number): Promise<CommandOutcome> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<CommandOutcome>((resolve) => {
      timer = setTimeout(() => resolve({ status: 'timeout', afterMs: timeoutMs }), timeoutMs);
    });
    const applied = this.loop.submit(command).then(
      (): CommandOutcome => ({ status: 'applied' }),
      (error: unknown): CommandOutcome => ({ status: 'failed', error })
    );
    try {
      const outcome = await Promise.race([applied, timedOut]);
      if (outcome.status === 'timeout') {
        this.diagnostics.warn(`Command '${command.type}' not acknowledged within ${timeoutMs} ms`);
      } else if (outcome.status === 'failed') {
        this.diagnostics.error(`Command '${command.type}' failed: ${describeError(outcome.error)}`);
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }
}
