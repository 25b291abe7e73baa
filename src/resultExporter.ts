import fs from "fs-extra";
import path from "path";
import { IssueQueryResult } from "./types";
import { logger } from "./logger";

export class ResultExporter {
  constructor(private readonly outputPath: string) {}

  async save(result: IssueQueryResult): Promise<void> {
    await fs.ensureDir(path.dirname(this.outputPath));
    await fs.writeJSON(this.outputPath, result, { spaces: 2 });
    logger.info(
      `Saved ${result.current.length} current and ${result.archived.length} archived issues to ${this.outputPath}`
    );
  }
}
