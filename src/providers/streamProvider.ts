import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Diagnostics } from '../diagnostics';
import { silentDiagnostics } from '../diagnostics';
import { describeError } from '../errors';
import { decodeWireFrame } from '../frame';
import { PushPoseProvider } from './pushProvider';

/**
 * Reads newline-delimited wire frames from a stream, e.g. a pose engine piping into
 * stdin. Malformed lines are dropped.
 */
export class StreamPoseProvider extends PushPoseProvider {
  private reader: Interface | null = null;
  private malformed = 0;

  constructor(
    private readonly input: Readable,
    diagnostics: Diagnostics = silentDiagnostics
  ) {
    super(diagnostics);
  }

  get malformedLines(): number {
    return this.malformed;
  }

  start(): void {
    if (this.reader) return;
    super.start();
    const reader = createInterface({ input: this.input, crlfDelay: Infinity });
    reader.on('line', (line) => this.handleLine(line));
    reader.on('close', () => {
      this.diagnostics.info('Pose input stream ended');
    });
    this.reader = reader;
  }

  stop(): void {
    this.reader?.close();
    this.reader = null;
    super.stop();
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;
    try {
      this.publish(decodeWireFrame(JSON.parse(trimmed)));
    } catch (err) {
      this.malformed += 1;
      this.diagnostics.warn(`Dropping malformed pose line: ${describeError(err)}`);
    }
  }
}
