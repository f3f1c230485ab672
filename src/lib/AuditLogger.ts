/**
 * Structured audit logging
 *
 * One JSON object per line on stderr, so it never mixes with the progress and
 * status output on stdout.
 */

export type AuditLevel = "AUDIT" | "WARN" | "ERROR";

export interface AuditRecord {
  timestamp: string;
  level: AuditLevel;
  operation: string;
  paths: string[];
  result: string;
}

export type AuditWriter = (line: string) => void;

export class AuditLogger {
  constructor(
    private enabled: boolean,
    private write: AuditWriter = (line) => process.stderr.write(`${line}\n`)
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  auditOperation(operation: string, paths: string[], result: string): void {
    this.log("AUDIT", operation, paths, result);
  }

  warn(operation: string, paths: string[], result: string): void {
    this.log("WARN", operation, paths, result);
  }

  error(operation: string, paths: string[], result: string): void {
    this.log("ERROR", operation, paths, result);
  }

  private log(
    level: AuditLevel,
    operation: string,
    paths: string[],
    result: string
  ): void {
    if (!this.enabled) {
      return;
    }
    const record: AuditRecord = {
      timestamp: new Date().toISOString(),
      level,
      operation,
      paths,
      result,
    };
    this.write(JSON.stringify(record));
  }
}

/** Logger that drops everything */
export const silentLogger = new AuditLogger(false);
