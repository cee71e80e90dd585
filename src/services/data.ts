/**
 * Catalog data for the simulated services, read from the JSON files beside this module.
 */
import { readFileSync } from "node:fs";
import { z } from "zod";

const RecipeBookSchema = z.record(
  z.string(),
  z.object({
    ingredients: z.array(z.string()).min(1),
    steps: z.array(z.string()).min(1),
  }),
);

const PriceListSchema = z.record(z.string(), z.number().nonnegative());

export type RecipeBook = z.infer<typeof RecipeBookSchema>;
export type PriceList = z.infer<typeof PriceListSchema>;

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(new URL(`./data/${file}`, import.meta.url), "utf-8"));
}

let recipes: RecipeBook | null = null;
let prices: PriceList | null = null;

export function loadRecipeBook(): RecipeBook {
  recipes ??= RecipeBookSchema.parse(readJson("recipes.json"));
  return recipes;
}

export function loadPriceList(): PriceList {
  prices ??= PriceListSchema.parse(readJson("products.json"));
  return prices;
}
