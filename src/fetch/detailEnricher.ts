/**
 * Detail enricher — best-effort fetch of GET /vacancies/{id}
 *
 * Failures are record-scoped: the record continues without detail fields.
 * Pacing between detail requests belongs to the caller.
 */

import type { RawDetail } from "@/types";
import type { HhClient } from "@/clients/hh";
import { HttpError } from "@/clients/http";
import * as logger from "@/logger";

export class DetailEnricher {
  constructor(private readonly client: Pick<HhClient, "getVacancy">) {}

  /**
   * @returns The detail body, or undefined if it could not be fetched
   */
  async fetchDetail(id: string): Promise<RawDetail | undefined> {
    try {
      return await this.client.getVacancy(id);
    } catch (error) {
      logger.warn("Vacancy detail unavailable, continuing without it", {
        id,
        status: error instanceof HttpError ? error.status : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
