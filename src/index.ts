import "dotenv/config";

import { createApp } from "./app";
import { PgFavoritesRepository, type FavoritesRepository } from "./db/favoritesRepository";
import { createPool } from "./db/pool";
import { toAppConfig, validateEnvironment } from "./middleware/validateEnv";
import { FavoritesStore } from "./services/favoritesStore";
import { FoodRecognizer } from "./services/foodRecognizer";
import { ImageIntake } from "./services/imageIntake";
import { InMemoryFavoritesRepository } from "./services/inMemoryStore";
import { OpenAIRecipeCapability, OpenAIVisionCapability } from "./services/openaiCapabilities";
import { RecipeGenerator } from "./services/recipeGenerator";
import { RecipePipeline } from "./services/recipePipeline";

const config = toAppConfig(validateEnvironment());

// Credentials are injected here once; nothing below reads process.env
const vision = new OpenAIVisionCapability({ apiKey: config.openai.apiKey, model: config.openai.visionModel });
const llm = new OpenAIRecipeCapability({ apiKey: config.openai.apiKey, model: config.openai.model });

const repository: FavoritesRepository = config.database.url
  ? new PgFavoritesRepository(createPool({ url: config.database.url, ssl: config.database.ssl }))
  : new InMemoryFavoritesRepository();

const pipeline = new RecipePipeline({
  intake: new ImageIntake({ maxImageBytes: config.intake.maxImageBytes }),
  recognizer: new FoodRecognizer(vision, { timeoutMs: config.recognition.timeoutMs }),
  generator: new RecipeGenerator(llm, config.generation),
  favorites: new FavoritesStore(repository),
  confidenceThreshold: config.recognition.confidenceThreshold,
});

const app = createApp({
  config,
  pipeline,
  health: () => ({
    vision: vision.isConfigured(),
    generation: llm.isConfigured(),
    storage: repository.kind,
  }),
});

app.listen(config.port, () => {
  console.log(`FridgeSnap backend listening on port ${config.port}`, {
    storage: repository.kind,
    aiConfigured: vision.isConfigured(),
  });
});
