// src/lib/services/deliverySinks.ts
import fs from "fs/promises";
import path from "path";
import type { ReportArtifact } from "@/lib/types";
import type { IReportDeliverySink } from "./reportGeneratorInterface";
import { logger } from "@/lib/services/logging";

const SINK_LOG_PREFIX = "DirectoryDeliverySink";

/**
 * "Save" delivery: copies the generated report into a folder the user keeps.
 */
export class DirectoryDeliverySink implements IReportDeliverySink {
  readonly name = "directory";

  constructor(private readonly directory: string) {}

  async deliver(artifact: ReportArtifact): Promise<void> {
    const target = path.join(this.directory, artifact.filename);
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(target, artifact.content);
    logger.info(SINK_LOG_PREFIX, `Saved ${artifact.filename} to ${target}`);
  }
}
