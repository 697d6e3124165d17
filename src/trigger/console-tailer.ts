import type { BuildIdentifier } from "../types/jenkins";
import type { TriggerApi } from "./types";

/**
 * Incremental reader for one build's console. The cursor is a byte offset
 * into the cumulative console text; it only moves forward and the tailer
 * cannot be pointed at another build.
 */
export class ConsoleTailer {
  readonly build: Readonly<BuildIdentifier>;
  private readonly client: Pick<TriggerApi, "getConsoleText">;
  private offset = 0;

  constructor(options: {
    client: Pick<TriggerApi, "getConsoleText">;
    build: BuildIdentifier;
  }) {
    this.client = options.client;
    this.build = Object.freeze({ ...options.build });
  }

  get cursor(): number {
    return this.offset;
  }

  /** Fetches the console and returns only the text past the cursor. */
  async poll(): Promise<string> {
    const text = await this.client.getConsoleText(this.build);
    return this.advance(text);
  }

  /** Consumes an already fetched cumulative console text. */
  advance(cumulativeText: string): string {
    const bytes = Buffer.from(cumulativeText, "utf8");
    if (bytes.length <= this.offset) {
      return "";
    }
    const suffix = bytes.subarray(this.offset).toString("utf8");
    this.offset = bytes.length;
    return suffix;
  }
}
