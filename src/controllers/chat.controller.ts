// src/controllers/chat.controller.ts
import type { ChatService } from "../services/chat.service";
import { validate } from "../middleware/validate";
import { chatSchema } from "../validators/chat";

export function createChatController(chat: ChatService) {
  return {
    reply: validate(chatSchema, async ({ body }, _req, res) => {
      res.json(await chat.reply(body));
    }),
  };
}
