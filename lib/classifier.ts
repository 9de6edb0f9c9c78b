// ---------------------------------------------------------------------------
// clanker-guard spam classification
// Thin client for an Ollama-compatible chat endpoint
// ---------------------------------------------------------------------------

import { UpstreamError } from "./errors";
import type { Classification } from "./types";

export const DEFAULT_SYSTEM_MESSAGE =
  "You are validating whether a message posted to a group chat contains spam or scam content. " +
  "If the message contains spam or scam content, respond with 'Yes'. " +
  "Your message must contain either 'Yes' or 'No'.";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ClassifyOptions {
  systemMessage?: string;
  /** Prior labelled exchanges sent ahead of the message. */
  examples?: ChatMessage[];
  think?: boolean;
}

export interface Classifier {
  readonly model: string;
  classify(text: string, options?: ClassifyOptions): Promise<Classification>;
}

export interface OllamaClassifierOptions {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class OllamaClassifier implements Classifier {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaClassifierOptions) {
    this.baseUrl = options.baseUrl;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async classify(text: string, options: ClassifyOptions = {}): Promise<Classification> {
    const messages: ChatMessage[] = [
      { role: "system", content: options.systemMessage ?? DEFAULT_SYSTEM_MESSAGE },
      ...(options.examples ?? []),
      // Raw text: dollar amounts and phone numbers are strong signals
      { role: "user", content: text },
    ];

    let res: Response;
    try {
      res = await this.fetchImpl(new URL("/api/chat", this.baseUrl).toString(), {
        method: "POST",
        headers: { "Content-Type": "application/json", "Accept": "application/json" },
        body: JSON.stringify({
          model: this.model,
          messages,
          stream: false,
          think: options.think ?? false,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamError(
        `Model endpoint unreachable: ${err instanceof Error ? err.message : "request failed"}`
      );
    }

    if (!res.ok) {
      throw new UpstreamError(`Model endpoint returned ${res.status}`);
    }

    const data: unknown = await res.json();
    const content = extractContent(data);
    if (content === null) {
      throw new UpstreamError("Model response had no message content");
    }

    return { spam: isSpamVerdict(content), model: this.model, content };
  }
}

/**
 * Read a Yes/No reply. The leading word decides; a reply that starts with
 * neither counts as spam only if it says "yes" and never "no". Reasoning
 * models wrap their scratchpad in <think> tags, which is ignored.
 */
export function isSpamVerdict(content: string): boolean {
  const answer = content.replace(/<think>[\s\S]*?<\/think>/gi, "").trim().toLowerCase();
  if (answer.startsWith("yes")) return true;
  if (answer.startsWith("no")) return false;
  return answer.includes("yes") && !answer.includes("no");
}

function extractContent(data: unknown): string | null {
  if (typeof data !== "object" || data === null || !("message" in data)) return null;
  const message = data.message;
  if (typeof message !== "object" || message === null || !("content" in message)) return null;
  return typeof message.content === "string" ? message.content : null;
}
