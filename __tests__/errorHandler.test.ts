import type { Server } from "http";
import axios, { AxiosInstance } from "axios";
import express from "express";
import mongoose from "mongoose";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { NotFoundError } from "../src/errors";
import { errorHandler, notFoundHandler } from "../src/middleware/errorHandler";

describe("errorHandler", () => {
  let server: Server;
  let http: AxiosInstance;

  beforeAll(async () => {
    const app = express();
    app.get("/missing", (_req, _res, next) => next(new NotFoundError("Product", "abc")));
    app.get("/invalid-document", (_req, _res, next) => {
      const err = new mongoose.Error.ValidationError();
      err.addError("slug", new mongoose.Error.ValidatorError({ path: "slug", message: "slug is required" }));
      next(err);
    });
    app.get("/bad-cast", (_req, _res, next) => next(new mongoose.Error.CastError("ObjectId", "abc", "_id")));
    app.get("/boom", () => {
      throw new Error("boom");
    });
    app.use(notFoundHandler);
    app.use(errorHandler);

    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server is not listening on a port");
    http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it("answers app errors with their status and code", async () => {
    const res = await http.get("/missing");
    expect(res.status).toBe(404);
    expect(res.data).toEqual({
      message: "Product abc not found",
      code: "NOT_FOUND",
      details: { entity: "Product", id: "abc" },
    });
  });

  it("maps schema validation failures to 422", async () => {
    const res = await http.get("/invalid-document");
    expect(res.status).toBe(422);
    expect(res.data).toEqual({
      message: "Invalid document",
      code: "VALIDATION_ERROR",
      details: [{ path: "slug", message: "slug is required" }],
    });
  });

  it("maps cast failures to 422", async () => {
    const res = await http.get("/bad-cast");
    expect(res.status).toBe(422);
    expect(res.data.message).toBe("Invalid value for _id");
    expect(res.data.details[0].path).toBe("_id");
  });

  it("hides unexpected errors behind a 500", async () => {
    const res = await http.get("/boom");
    expect(res.status).toBe(500);
    expect(res.data).toEqual({ message: "Internal server error", code: "INTERNAL_ERROR" });
  });

  it("answers unknown routes with 404", async () => {
    expect((await http.get("/nowhere")).data).toEqual({ message: "Route not found", code: "NOT_FOUND" });
  });
});
