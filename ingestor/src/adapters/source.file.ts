import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { Logger, silentLogger } from "@listingtrail/shared-utils";
import { SourceItem, SourcePort } from "../core/ports";

const FILE_PATTERN = /^([a-z][a-z0-9-]*)_.*\.json$/;

const payloadArray = z.array(z.unknown());

/**
 * Reads scraper output files named `<source>_<anything>.json`, each a JSON
 * array of raw payloads. Files are read in name order, so date-stamped
 * runs replay oldest first.
 */
export class FileSource implements SourcePort {
  constructor(
    private directory: string,
    private sources: string[] = [],
    private logger: Logger = silentLogger
  ) {}

  async readBatch(): Promise<SourceItem[]> {
    const names = (await fs.promises.readdir(this.directory)).sort();
    const items: SourceItem[] = [];

    for (const name of names) {
      const match = FILE_PATTERN.exec(name);
      if (!match) continue;

      const sourceId = match[1];
      if (this.sources.length > 0 && !this.sources.includes(sourceId)) {
        this.logger.debug(`Skipping ${name}: source ${sourceId} not enabled`);
        continue;
      }

      const filePath = path.join(this.directory, name);
      const content = await fs.promises.readFile(filePath, "utf-8");
      const parsed = payloadArray.safeParse(JSON.parse(content));
      if (!parsed.success) {
        throw new Error(`${filePath} must contain a JSON array of payloads`);
      }

      this.logger.info(`Read ${parsed.data.length} payload(s) from ${name}`);
      for (const payload of parsed.data) {
        items.push({ sourceId, payload, origin: name });
      }
    }

    return items;
  }
}
