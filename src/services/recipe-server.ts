/**
 * Recipe service: looks dishes up in the recipe book.
 *
 * Answers are nested one serialized layer deeper than the other services.
 */
import { CAPABILITIES } from "../capabilities/schemas.ts";
import { CapabilityServer, ServiceFailure, capabilityTool } from "./server.ts";
import { loadRecipeBook, type RecipeBook } from "./data.ts";

export const RECIPE_SERVICE = "recipe";

export function createRecipeServer(book: RecipeBook = loadRecipeBook()): CapabilityServer {
  const fetchDetails = capabilityTool("fetch_details", CAPABILITIES.fetch_details, ({ subject }) => {
    const dish = subject.toLowerCase();
    const recipe = Object.hasOwn(book, dish) ? book[dish] : undefined;
    if (!recipe) {
      throw new ServiceFailure("RecipeNotFound", `Recipe for '${dish}' not found`, {
        requested: dish,
        available: Object.keys(book),
      });
    }
    return { required_items: recipe.ingredients, result_steps: recipe.steps };
  });

  return new CapabilityServer(RECIPE_SERVICE, [fetchDetails], { nested: true });
}
