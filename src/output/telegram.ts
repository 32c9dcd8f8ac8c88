import * as core from "@actions/core";
import { DeliveryError, describeError } from "../errors.js";
import type { WatchConfig } from "../config.js";
import type { ScoredKernel } from "../sources/types.js";
import type { BestState } from "../tracker/state.js";

const TELEGRAM_API_URL = "https://api.telegram.org";

export interface TelegramTarget {
  botToken: string;
  chatId: string;
}

export function buildMessage(kernel: ScoredKernel, previous: BestState): string {
  const lines = [
    "New best kernel published!",
    `Title: ${kernel.title}`,
    `Score: ${kernel.score}`,
  ];
  if (previous.score !== undefined) {
    lines.push(`Previous best: ${previous.score}`);
  }
  if (kernel.url) {
    lines.push(`URL: ${kernel.url}`);
  }
  return lines.join("\n");
}

function readTarget(): TelegramTarget | undefined {
  const botToken = core.getInput("telegram_bot_token");
  const chatId = core.getInput("telegram_chat_id");
  if (!botToken || !chatId) return undefined;
  return { botToken, chatId };
}

async function readDescription(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (
      typeof body === "object" &&
      body !== null &&
      "description" in body &&
      typeof body.description === "string"
    ) {
      return body.description;
    }
  } catch {
    return `HTTP ${response.status}`;
  }
  return `HTTP ${response.status}`;
}

export async function sendNotification(
  message: string,
  config: WatchConfig,
  fetchFn?: typeof fetch,
  target?: TelegramTarget
): Promise<void> {
  const fetcher = fetchFn ?? fetch;
  const destination = target ?? readTarget();
  if (!destination) {
    throw new DeliveryError(
      "Telegram bot token or chat id is not configured"
    );
  }

  let response: Response;
  try {
    response = await fetcher(
      `${TELEGRAM_API_URL}/bot${destination.botToken}/sendMessage`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: destination.chatId, text: message }),
        signal: AbortSignal.timeout(config.request_timeout_seconds * 1000),
      }
    );
  } catch (error) {
    throw new DeliveryError(
      `Telegram request failed: ${describeError(error)}`,
      undefined,
      { cause: error }
    );
  }

  if (!response.ok) {
    const description = await readDescription(response);
    throw new DeliveryError(
      `Telegram rejected the message: ${description}`,
      response.status
    );
  }

  core.info("Notification sent");
}
