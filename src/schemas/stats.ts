import { z } from "zod";
import { PATCH_CATEGORIES } from "../types/records.js";

const rowCount = z.coerce.number().int().min(1).max(200).default(10);
// Lane/rank stay raw here; alias resolution owns their validation.
const filter = z.string().max(32).default("");
const champion = z.string().min(1).max(40);

export const tierlistQuerySchema = z
  .object({
    n: rowCount,
    lane: filter,
    rank: filter
  })
  .strict();

export const countersQuerySchema = z
  .object({
    champion,
    n: rowCount,
    rank: filter
  })
  .strict();

export const championDataQuerySchema = z
  .object({
    champion,
    lane: filter,
    rank: filter
  })
  .strict();

export const matchupQuerySchema = z
  .object({
    champion1: champion,
    champion2: champion,
    lane: filter,
    rank: filter
  })
  .strict()
  .refine((data) => data.champion1 !== data.champion2, {
    message: "champion1 and champion2 must be different.",
    path: ["champion2"]
  });

export const patchNotesQuerySchema = z
  .object({
    category: z.enum(PATCH_CATEGORIES).default("all"),
    rank: filter
  })
  .strict();
