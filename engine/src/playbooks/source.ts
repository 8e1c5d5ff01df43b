import { readFile } from "node:fs/promises";
import path from "node:path";
import { parsePlaybookDocument, type JsonObject, type Playbook } from "@incident/shared";
import { PlaybookNotFoundError } from "../errors.js";

export interface PlaybookSource {
  /** `context` is handed over for sources that render playbooks per case. */
  load(playbookId: string, context: JsonObject): Promise<Playbook>;
}

const PLAYBOOK_ID = /^[A-Za-z0-9_-]+$/;

/** Reads `<directory>/<playbookId>.json` documents. */
export class FilePlaybookSource implements PlaybookSource {
  constructor(private readonly directory: string) {}

  async load(playbookId: string, _context: JsonObject): Promise<Playbook> {
    if (!PLAYBOOK_ID.test(playbookId)) {
      throw new PlaybookNotFoundError(playbookId);
    }
    let raw: string;
    try {
      raw = await readFile(path.join(this.directory, `${playbookId}.json`), "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new PlaybookNotFoundError(playbookId);
      }
      throw error;
    }
    return parsePlaybookDocument(JSON.parse(raw));
  }
}
