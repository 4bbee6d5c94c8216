import { z } from "zod";
import { loadQualifierConfig } from "@/src/lib/config/env";
import { CollectionError, ConfigError } from "@/src/lib/errors";
import { createLogger } from "@/src/lib/log/logger";
import { createSteamClient, qualifyAccount } from "@/src/lib/qualify/qualify";
import type { QualifyErrorResponse } from "@/src/lib/types";

const logger = createLogger("QualifyRoute");

const requestSchema = z.object({
  steamId: z
    .string()
    .trim()
    .regex(/^\d{17}$/, "Steam ID must be a 17-digit SteamID64.")
});

const errorResponse = (body: QualifyErrorResponse, status: number) =>
  Response.json(body, { status });

export async function POST(request: Request) {
  let json: unknown;
  try {
    json = await request.json();
  } catch {
    return errorResponse(
      { error: { kind: "InvalidRequest", message: "Request body must be JSON.", retryable: false } },
      400
    );
  }

  const parsed = requestSchema.safeParse(json);
  if (!parsed.success) {
    return errorResponse(
      {
        error: {
          kind: "InvalidRequest",
          message: parsed.error.issues.map((issue) => issue.message).join(" "),
          retryable: false
        }
      },
      400
    );
  }

  try {
    const config = loadQualifierConfig();
    const result = await qualifyAccount(parsed.data, {
      client: createSteamClient(config),
      achievementConcurrency: config.achievementConcurrency,
      timeoutMs: config.timeoutMs,
      signal: request.signal
    });
    return Response.json(result);
  } catch (error) {
    if (error instanceof CollectionError) {
      return errorResponse(
        {
          error: {
            kind: error.kind,
            message: error.message,
            hint: error.hint,
            retryable: error.retryable
          }
        },
        error.kind === "PrivateOrEmptyProfile" ? 422 : 503
      );
    }
    if (error instanceof ConfigError) {
      logger.error("Qualifier is misconfigured", { issues: error.issues });
      return errorResponse(
        {
          error: {
            kind: "Configuration",
            message: "The qualifier is not configured.",
            retryable: false
          }
        },
        500
      );
    }
    if (request.signal.aborted) {
      logger.info("Client disconnected before the check finished", {
        steamId: parsed.data.steamId
      });
      return new Response(null, { status: 499 });
    }
    logger.error("Qualification check failed", {
      error: error instanceof Error ? error.message : String(error)
    });
    return errorResponse(
      { error: { kind: "Internal", message: "Qualification check failed.", retryable: true } },
      500
    );
  }
}
