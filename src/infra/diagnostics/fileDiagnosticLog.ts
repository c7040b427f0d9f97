import { promises as fs } from "node:fs";
import path from "node:path";
import { ContextDiagnostics, DiagnosticSink } from "../../pipelines/contextAssembly.js";
import { createLogger, describeError } from "../../utils/logger.js";

export const DIAGNOSTIC_LOG_FILE = "app.log";

const logger = createLogger("diagnostics");

/**
 * Appends one JSON line per assembled context to `<directory>/app.log`, so
 * answers can be reviewed offline against exactly what the model was given.
 * Writes are queued and never block the request.
 */
export class FileDiagnosticLog {
  readonly filePath: string;

  private writeChain: Promise<void> = Promise.resolve();

  constructor(directory: string) {
    this.filePath = path.resolve(directory, DIAGNOSTIC_LOG_FILE);
  }

  readonly sink: DiagnosticSink = (record) => {
    this.enqueueWrite(() => this.append(record));
  };

  /** Resolves once every queued record has been written (or has failed). */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  private enqueueWrite(task: () => Promise<void>): void {
    this.writeChain = this.writeChain.then(task).catch((error: unknown) => {
      logger.warn("Could not write diagnostic record.", {
        file: this.filePath,
        reason: describeError(error),
      });
    });
  }

  private async append(record: ContextDiagnostics): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const line = JSON.stringify({ at: new Date().toISOString(), ...record });
    await fs.appendFile(this.filePath, `${line}\n`, "utf-8");
  }
}

export function combineDiagnosticSinks(...sinks: DiagnosticSink[]): DiagnosticSink {
  return (record) => {
    for (const sink of sinks) {
      sink(record);
    }
  };
}
