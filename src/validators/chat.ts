// validators/chat.ts
import { z } from "zod";

export const chatSchema = z.object({
  body: z.object({
    message: z.string().trim().min(1).max(2000),
    context: z.record(z.string(), z.unknown()).optional(),
  }),
});
