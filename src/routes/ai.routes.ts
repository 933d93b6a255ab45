// src/routes/ai.routes.ts
import { Router } from "express";
import { createChatController } from "../controllers/chat.controller";
import type { Services } from "../container";

export function aiRoutes({ chat }: Services): Router {
  const r = Router();
  r.post("/chat", createChatController(chat).reply);
  return r;
}
