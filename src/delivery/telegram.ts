// pattern: Imperative Shell
import { z } from "zod/v3";
import type { Logger } from "pino";
import { truncate } from "../pipeline/text";
import { timeoutSignal } from "../shared/abort";
import type { DeliveryTarget, TargetOutcome } from "./target";

const CAPTION_LIMIT = 1024;
const MESSAGE_LIMIT = 4096;
const DEFAULT_API_BASE = "https://api.telegram.org";

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  parameters: z
    .object({
      retry_after: z.number().optional(),
    })
    .optional(),
});

export type TelegramTargetOptions = {
  readonly botToken: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly parseMode?: "HTML";
  readonly disablePreview?: boolean;
  readonly apiBaseUrl?: string;
  /** Aborts requests in flight on shutdown. */
  readonly signal?: AbortSignal;
};

function fit(text: string, limit: number): string {
  return text.length <= limit ? text : truncate(text, limit - 3);
}

/**
 * Maps an HTTP exchange with the Bot API onto the delivery error taxonomy.
 * 429 or a `retry_after` hint means rate limited, 5xx is transient, and any
 * other refusal is permanent.
 */
export function classifyResponse(status: number, body: unknown): TargetOutcome {
  const parsed = telegramResponseSchema.safeParse(body);
  const payload = parsed.success ? parsed.data : null;

  if (payload?.ok === true && status >= 200 && status < 300) {
    return { ok: true };
  }

  const description = payload?.description ?? `HTTP ${status}`;
  const retryAfter = payload?.parameters?.retry_after;

  if (status === 429 || retryAfter !== undefined) {
    return {
      ok: false,
      errorKind: "rate_limited",
      error: description,
      retryAfterSeconds: retryAfter ?? 1,
    };
  }

  if (status >= 500 || payload === null) {
    return { ok: false, errorKind: "transient_network", error: description };
  }

  return { ok: false, errorKind: "permanent_rejection", error: description };
}

/**
 * Delivery target backed by the Telegram Bot API. Messages with an image go
 * out through `sendPhoto` with the text as caption; if Telegram refuses the
 * photo, the text is sent on its own through `sendMessage`.
 */
export function createTelegramTarget(options: TelegramTargetOptions): DeliveryTarget {
  const base = options.apiBaseUrl ?? DEFAULT_API_BASE;
  const apiUrl = (method: string) => `${base}/bot${options.botToken}/${method}`;

  const call = async (
    method: string,
    body: Record<string, unknown>,
  ): Promise<TargetOutcome> => {
    try {
      const response = await fetch(apiUrl(method), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: timeoutSignal(options.timeoutMs, options.signal),
      });

      let payload: unknown = null;
      try {
        payload = await response.json();
      } catch {
        payload = null;
      }

      return classifyResponse(response.status, payload);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, errorKind: "transient_network", error: message };
    }
  };

  const withParseMode = (body: Record<string, unknown>) =>
    options.parseMode ? { ...body, parse_mode: options.parseMode } : body;

  const sendMessage = (chatId: string, text: string) =>
    call(
      "sendMessage",
      withParseMode({
        chat_id: chatId,
        text: fit(text, MESSAGE_LIMIT),
        disable_web_page_preview: options.disablePreview ?? true,
      }),
    );

  return async (destinationId, text, imageUrl) => {
    if (!imageUrl) {
      return sendMessage(destinationId, text);
    }

    const photo = await call(
      "sendPhoto",
      withParseMode({
        chat_id: destinationId,
        photo: imageUrl,
        caption: fit(text, CAPTION_LIMIT),
      }),
    );

    if (!photo.ok && photo.errorKind === "permanent_rejection") {
      options.logger.warn(
        { imageUrl, error: photo.error },
        "photo rejected, sending text only",
      );
      return sendMessage(destinationId, text);
    }

    return photo;
  };
}
