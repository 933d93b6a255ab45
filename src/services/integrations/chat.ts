// src/services/integrations/chat.ts
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { toUpstreamError } from "./upstream";

export interface ChatRequest {
  message: string;
  context?: Record<string, unknown>;
}

export interface ChatProvider {
  complete(req: ChatRequest): Promise<string>;
}

export const DEFAULT_REPLY = "Hi! Tell me how you like your tea: floral, bold, or herbal?";

const SYSTEM_PROMPT =
  "You are the tea sommelier of an online tea store. Recommend teas from the store, " +
  "explain brewing temperature and steeping time, and keep answers short and friendly.";

const CompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

/** Used when no provider key is configured. */
export class CannedChatProvider implements ChatProvider {
  async complete(): Promise<string> {
    return DEFAULT_REPLY;
  }
}

/** OpenAI-compatible chat completions endpoint. */
export class OpenAiChatProvider implements ChatProvider {
  private readonly http: AxiosInstance;

  constructor(private readonly options: { apiKey: string; baseUrl: string; model: string; timeoutMs: number }) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      headers: { Authorization: `Bearer ${options.apiKey}` },
      timeout: options.timeoutMs,
    });
  }

  async complete(req: ChatRequest): Promise<string> {
    const messages = [{ role: "system", content: SYSTEM_PROMPT }];
    if (req.context && Object.keys(req.context).length > 0) {
      messages.push({ role: "system", content: `Shopper context: ${JSON.stringify(req.context)}` });
    }
    messages.push({ role: "user", content: req.message });

    try {
      const { data } = await this.http.post<unknown>("/chat/completions", {
        model: this.options.model,
        messages,
        temperature: 0.7,
      });
      const parsed = CompletionSchema.parse(data);
      return parsed.choices[0].message.content?.trim() || DEFAULT_REPLY;
    } catch (err) {
      throw toUpstreamError("ai", err);
    }
  }
}
