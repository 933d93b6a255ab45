// src/routes/health.routes.ts
import { Router } from "express";

export type StoreStatus = "up" | "down" | "memory";

export function healthRoutes(storeStatus: () => StoreStatus): Router {
  const r = Router();

  r.get("/", (_req, res) => {
    res.json({ name: "tea-store-api", status: "running" });
  });

  r.get("/health", (_req, res) => {
    const store = storeStatus();
    res.status(store === "down" ? 503 : 200).json({
      status: store === "down" ? "degraded" : "ok",
      store,
      uptime: Math.round(process.uptime()),
    });
  });

  return r;
}
