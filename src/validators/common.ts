// validators/common.ts
import { z } from "zod";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "../services/catalog.service";

export const objectId = z.string().regex(/^[0-9a-fA-F]{24}$/, "must be a 24-character hex id");

export const idParams = z.object({ id: objectId });

export const paging = {
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
};

/** Query-string booleans arrive as text. */
export const queryBool = z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1");
