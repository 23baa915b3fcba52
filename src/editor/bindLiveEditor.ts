import type { CaptureController, CommandOutcome } from '../capture/controller';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../capture/controller';
import type { Diagnostics } from '../diagnostics';
import { silentDiagnostics } from '../diagnostics';
import { describeError } from '../errors';
import type { SeatingLayout } from '../seating/layout';
import type { LiveSeatingEditor } from './liveSeatingEditor';

export interface BindOptions {
  timeoutMs?: number;
  diagnostics?: Diagnostics;
  /** Called with every acknowledgement, applied or not. */
  onOutcome?: (outcome: CommandOutcome, layout: SeatingLayout | null) => void;
}

/**
 * Route editor emissions into a running capture loop. Returns an unbind function.
 */
export function bindLiveEditor(
  editor: LiveSeatingEditor,
  controller: CaptureController,
  options: BindOptions = {}
): () => void {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const diagnostics = options.diagnostics ?? silentDiagnostics;

  editor.setOnLayoutChanged((layout) => {
    void controller.requestSeatingUpdate(layout, timeoutMs).then((outcome) => {
      if (outcome.status !== 'applied') {
        diagnostics.warn(`Live seating update was not applied (${outcome.status})`);
      }
      try {
        options.onOutcome?.(outcome, layout);
      } catch (err) {
        diagnostics.error(`Seating outcome handler failed: ${describeError(err)}`);
      }
    });
  });

  return () => editor.setOnLayoutChanged(null);
}
