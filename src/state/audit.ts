import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export interface AuditEntry {
  ts: string;
  action: string;
  taskId: string;
  ok: boolean;
  from?: string;
  to?: string;
  error?: string;
}

export class AuditLog {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async log(entry: AuditEntry): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
    } catch {
      // audit logging should never break the main flow
    }
  }

  getFilePath(): string {
    return this.filePath;
  }
}
