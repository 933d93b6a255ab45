// src/services/integrations/upstream.ts
import axios from "axios";
import { UpstreamServiceError } from "../../errors";
import { logger } from "../../utils/logger";

/**
 * Maps a failed provider call to an UpstreamServiceError: no answer,
 * 429 or 503 means the provider is unavailable; any other failure is a
 * bad gateway.
 */
export function toUpstreamError(service: string, err: unknown): UpstreamServiceError {
  if (err instanceof UpstreamServiceError) return err;

  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const unavailable = status === undefined || status === 429 || status === 503;
    logger.error("upstream call failed", {
      service,
      status,
      code: err.code,
      url: err.config?.url,
      error: err.message,
    });
    return new UpstreamServiceError(
      service,
      unavailable ? `${service} is unavailable` : `${service} returned an error (${status})`,
      { unavailable, cause: err }
    );
  }

  logger.error("upstream call failed", {
    service,
    error: err instanceof Error ? err.message : String(err),
  });
  return new UpstreamServiceError(service, `${service} call failed`, { cause: err });
}

export function notConfigured(service: string): UpstreamServiceError {
  return new UpstreamServiceError(service, `${service} is not configured`, { unavailable: true });
}
