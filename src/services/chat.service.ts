// src/services/chat.service.ts
import type { ChatProvider, ChatRequest } from "./integrations/chat";
import { logger } from "../utils/logger";

export class ChatService {
  constructor(private readonly provider: ChatProvider) {}

  async reply(req: ChatRequest): Promise<{ reply: string }> {
    const started = Date.now();
    const reply = await this.provider.complete(req);
    logger.debug("chat reply", { chars: reply.length, ms: Date.now() - started });
    return { reply };
  }
}
