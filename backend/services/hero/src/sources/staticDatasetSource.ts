// backend/services/hero/src/sources/staticDatasetSource.ts
import fsp from "node:fs/promises";
import axios, { type AxiosResponse } from "axios";
import { z } from "zod";
import { logger } from "../../../shared/utils/logger";
import type { HeroRecord } from "../contracts/hero";
import { HeroNotFoundError, SourceUnavailableError } from "../errors";
import { describeError, pickExactMatch, type HeroSource } from "./HeroSource";

export type StaticDatasetOptions = {
  url: string;
  /** Local copy of the dataset; read instead of `url` when set. */
  path?: string;
  timeoutMs: number;
};

const zDataset = z.array(z.unknown());

/**
 * Token-free provider: the whole hero list as one JSON array, matched in memory.
 * Read on every lookup; nothing is kept between requests.
 */
export class StaticDatasetSource implements HeroSource {
  readonly kind = "static-dataset" as const;

  constructor(private readonly opts: StaticDatasetOptions) {}

  private async readLocal(path: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fsp.readFile(path, "utf8");
    } catch (err) {
      logger.warn(
        { path, err: describeError(err) },
        "[StaticDatasetSource] read failed"
      );
      throw new SourceUnavailableError(
        `Hero dataset could not be read: ${describeError(err)}`
      );
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      logger.warn({ path }, "[StaticDatasetSource] invalid JSON");
      throw new SourceUnavailableError(
        `Hero dataset is not valid JSON: ${describeError(err)}`
      );
    }
  }

  private async download(url: string): Promise<unknown> {
    let r: AxiosResponse<unknown>;
    try {
      r = await axios.get<unknown>(url, {
        timeout: this.opts.timeoutMs,
        validateStatus: () => true,
      });
    } catch (err) {
      logger.warn(
        { url, err: describeError(err) },
        "[StaticDatasetSource] download failed"
      );
      throw new SourceUnavailableError(
        `Hero dataset download failed: ${describeError(err)}`
      );
    }
    if (r.status < 200 || r.status >= 300) {
      logger.warn({ url, status: r.status }, "[StaticDatasetSource] non-2xx");
      throw new SourceUnavailableError(
        `Hero dataset answered with status ${r.status}`
      );
    }
    return r.data;
  }

  async fetchHero(name: string): Promise<HeroRecord> {
    const target = name.trim();
    logger.debug(
      { url: this.opts.url, path: this.opts.path, name: target },
      "[StaticDatasetSource] lookup"
    );

    const data = this.opts.path
      ? await this.readLocal(this.opts.path)
      : await this.download(this.opts.url);

    const parsed = zDataset.safeParse(data);
    if (!parsed.success) {
      throw new SourceUnavailableError("Hero dataset is not a JSON array");
    }

    const hero = pickExactMatch(parsed.data, target);
    if (!hero) throw new HeroNotFoundError(target);
    return hero;
  }
}
