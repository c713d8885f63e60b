// backend/services/hero/src/sources/officialApiSource.ts
import axios, { type AxiosResponse } from "axios";
import { z } from "zod";
import { logger } from "../../../shared/utils/logger";
import type { HeroRecord } from "../contracts/hero";
import { HeroNotFoundError, SourceUnavailableError } from "../errors";
import { describeError, pickExactMatch, type HeroSource } from "./HeroSource";

export type OfficialApiOptions = {
  token: string;
  baseUrl: string;
  timeoutMs: number;
};

/** superheroapi.com search envelope; `results` entries are checked one by one. */
const zSearchResponse = z.object({
  response: z.string(),
  results: z.array(z.unknown()).optional(),
  error: z.string().optional(),
});

/** The provider's `error` text when a search has no candidates. */
export const NO_MATCH_ERROR = "character with given name not found";

/**
 * Token-gated provider: GET {baseUrl}/{token}/search/{name}.
 * The provider answers 200 with `response: "error"` both when nothing matches
 * and when it refuses the call (bad token, bad request); only the former is a
 * miss.
 */
export class OfficialApiSource implements HeroSource {
  readonly kind = "official-api" as const;

  constructor(private readonly opts: OfficialApiOptions) {}

  private searchUrl(name: string, token: string): string {
    const base = this.opts.baseUrl.replace(/\/+$/, "");
    return `${base}/${encodeURIComponent(token)}/search/${encodeURIComponent(name)}`;
  }

  async fetchHero(name: string): Promise<HeroRecord> {
    const target = name.trim();
    const url = this.searchUrl(target, this.opts.token);
    const logUrl = this.searchUrl(target, "***");
    logger.debug({ url: logUrl }, "[OfficialApiSource] search");

    let r: AxiosResponse<unknown>;
    try {
      r = await axios.get<unknown>(url, {
        timeout: this.opts.timeoutMs,
        validateStatus: () => true,
      });
    } catch (err) {
      logger.warn(
        { url: logUrl, err: describeError(err) },
        "[OfficialApiSource] request failed"
      );
      throw new SourceUnavailableError(
        `Superhero API request failed: ${describeError(err)}`
      );
    }

    if (r.status < 200 || r.status >= 300) {
      logger.warn(
        { url: logUrl, status: r.status },
        "[OfficialApiSource] non-2xx response"
      );
      throw new SourceUnavailableError(
        `Superhero API answered with status ${r.status}`
      );
    }

    const parsed = zSearchResponse.safeParse(r.data);
    if (!parsed.success) {
      logger.warn({ url: logUrl }, "[OfficialApiSource] malformed response");
      throw new SourceUnavailableError("Superhero API returned a malformed response");
    }
    if (parsed.data.response !== "success") {
      const providerError = parsed.data.error ?? "";
      if (providerError === NO_MATCH_ERROR) {
        logger.debug({ url: logUrl }, "[OfficialApiSource] no match");
        throw new HeroNotFoundError(target);
      }
      const masked = providerError.split(this.opts.token).join("***");
      logger.warn(
        { url: logUrl, error: masked },
        "[OfficialApiSource] provider refused the request"
      );
      throw new SourceUnavailableError(
        `Superhero API answered with an error: ${masked || "no detail"}`
      );
    }

    const hero = pickExactMatch(parsed.data.results ?? [], target);
    if (!hero) throw new HeroNotFoundError(target);
    return hero;
  }
}
