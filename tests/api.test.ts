import { test, expect, type APIResponse } from "@playwright/test";
import { once } from "node:events";
import type { Server } from "node:http";
import { z } from "zod";
import { createApp } from "../src/app";
import type { AppConfig } from "../src/middleware/validateEnv";
import { SHORTFALL_NOTICE } from "../src/routes/recipes";
import { FavoritesStore } from "../src/services/favoritesStore";
import { FoodRecognizer } from "../src/services/foodRecognizer";
import { ImageIntake } from "../src/services/imageIntake";
import { InMemoryFavoritesRepository } from "../src/services/inMemoryStore";
import { RecipeGenerator } from "../src/services/recipeGenerator";
import { RecipePipeline } from "../src/services/recipePipeline";
import {
  EGG_AND_MILK,
  FakeRecipeLlm,
  FakeVision,
  makeRecipe,
  recipesReply,
  solidImage,
  testConfig,
} from "./helpers";

// Suites share one server each and script the fakes' replies in order
test.describe.configure({ mode: "serial" });

const apiBody = z.object({
  ok: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  meta: z.record(z.unknown()).optional(),
});

async function readBody(res: APIResponse) {
  return apiBody.parse(await res.json());
}

interface Harness {
  baseUrl: string;
  vision: FakeVision;
  llm: FakeRecipeLlm;
  close: () => Promise<void>;
}

async function startServer(vision: FakeVision, llm: FakeRecipeLlm, config: AppConfig = testConfig()): Promise<Harness> {
  const pipeline = new RecipePipeline({
    intake: new ImageIntake(config.intake),
    recognizer: new FoodRecognizer(vision, { timeoutMs: 1000 }),
    generator: new RecipeGenerator(llm, config.generation),
    favorites: new FavoritesStore(new InMemoryFavoritesRepository()),
    confidenceThreshold: config.recognition.confidenceThreshold,
  });
  const app = createApp({
    config,
    pipeline,
    health: () => ({ vision: vision.isConfigured(), generation: llm.isConfigured(), storage: "memory" }),
  });

  const server: Server = app.listen(0);
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    vision,
    llm,
    close: async () => {
      server.close();
      await once(server, "close");
    },
  };
}

function photo(buffer: Buffer, mimeType: string, field = "image") {
  return { multipart: { [field]: { name: "fridge", mimeType, buffer } } };
}

test.describe("HTTP API", () => {
  let h: Harness;

  test.beforeAll(async () => {
    h = await startServer(
      new FakeVision([EGG_AND_MILK, EGG_AND_MILK]),
      new FakeRecipeLlm([recipesReply([makeRecipe("A"), makeRecipe("B")]), recipesReply([makeRecipe("C")])])
    );
  });

  test.afterAll(async () => {
    await h.close();
  });

  test("GET /health reports capabilities and storage", async ({ request }) => {
    const res = await request.get(`${h.baseUrl}/health`);
    expect(res.status()).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      service: "fridgesnap-backend",
      capabilities: { vision: true, generation: true },
      storage: "memory",
    });
  });

  test("POST /api/v1/recognize accepts a food photo", async ({ request }) => {
    const res = await request.post(`${h.baseUrl}/api/v1/recognize`, photo(await solidImage("png"), "image/png"));
    expect(res.status()).toBe(200);

    const body = await readBody(res);
    expect(body.data).toMatchObject({ status: "accepted", items: ["egg", "milk"] });
  });

  test("POST /api/v1/recognize takes the photo field too", async ({ request }) => {
    const res = await request.post(
      `${h.baseUrl}/api/v1/recognize`,
      photo(await solidImage("jpeg"), "image/jpeg", "photo")
    );
    expect(res.status()).toBe(200);
  });

  test("POST /api/v1/recognize without a file is a 400", async ({ request }) => {
    const res = await request.post(`${h.baseUrl}/api/v1/recognize`, { multipart: { note: "no photo here" } });

    expect(res.status()).toBe(400);
    const body = await readBody(res);
    expect(body.ok).toBe(false);
    expect(body.meta?.code).toBe("VALIDATION_ERROR");
  });

  test("POST /api/v1/recognize rejects a non-image with 415", async ({ request }) => {
    const res = await request.post(
      `${h.baseUrl}/api/v1/recognize`,
      photo(Buffer.from("definitely not a picture"), "image/png")
    );

    expect(res.status()).toBe(415);
    const body = await readBody(res);
    expect(body.meta?.code).toBe("UNSUPPORTED_FORMAT");
    expect(body.error).toBe("Unsupported image format. Please upload a JPEG, PNG or WebP photo.");
  });

  test("POST /api/v1/recipes returns recipes with a shortfall notice", async ({ request }) => {
    const res = await request.post(`${h.baseUrl}/api/v1/recipes`, {
      data: { items: ["egg", "spinach"], preferences: { dietary: ["healthy"] } },
    });
    expect(res.status()).toBe(200);

    const body = await readBody(res);
    expect(body.data).toEqual({
      recipes: [makeRecipe("A"), makeRecipe("B"), makeRecipe("C")],
      count: 3,
      shortfall: true,
      attempts: 2,
    });
    expect(body.meta).toEqual({ notice: SHORTFALL_NOTICE });
  });

  test("POST /api/v1/recipes validates the body before calling out", async ({ request }) => {
    const calls = h.llm.calls.length;
    const res = await request.post(`${h.baseUrl}/api/v1/recipes`, { data: { items: [], preferences: {} } });

    expect(res.status()).toBe(400);
    expect((await readBody(res)).meta?.code).toBe("VALIDATION_ERROR");
    expect(h.llm.calls).toHaveLength(calls);
  });

  test("rejects malformed JSON bodies", async ({ request }) => {
    const res = await request.post(`${h.baseUrl}/api/v1/recipes`, {
      headers: { "Content-Type": "application/json" },
      data: "{",
    });
    expect(res.status()).toBe(400);
    expect((await readBody(res)).error).toBe("Request body is not valid JSON");
  });

  test("saves, lists, filters and deletes favorites", async ({ request }) => {
    const created = await request.post(`${h.baseUrl}/api/v1/favorites`, {
      data: {
        recipe: makeRecipe("Greek Yogurt Bowl", { tags: ["Breakfast", "healthy"] }),
        items_used: ["greek yogurt"],
      },
    });
    expect(created.status()).toBe(201);
    const { id } = z.object({ id: z.number() }).parse((await readBody(created)).data);

    const listed = await request.get(`${h.baseUrl}/api/v1/favorites`);
    const favorites = z
      .array(z.object({ id: z.number(), title: z.string(), tags: z.array(z.string()), calories: z.number() }))
      .parse((await readBody(listed)).data);
    expect(favorites).toEqual([{ id, title: "Greek Yogurt Bowl", tags: ["breakfast", "healthy"], calories: 350 }]);

    const filtered = await request.get(`${h.baseUrl}/api/v1/favorites?tag=vegetarian`);
    expect((await readBody(filtered)).data).toEqual([]);

    const removed = await request.delete(`${h.baseUrl}/api/v1/favorites/${id}`);
    expect(removed.status()).toBe(204);

    const again = await request.delete(`${h.baseUrl}/api/v1/favorites/${id}`);
    expect(again.status()).toBe(404);
    expect((await readBody(again)).meta?.code).toBe("NOT_FOUND");
  });

  test("rejects a favorite that fails the recipe schema", async ({ request }) => {
    const res = await request.post(`${h.baseUrl}/api/v1/favorites`, {
      data: { recipe: makeRecipe("Too Short", { steps: ["eat"] }) },
    });
    expect(res.status()).toBe(400);
    expect((await readBody(res)).meta?.code).toBe("VALIDATION_ERROR");
  });

  test("rejects a non-numeric favorite id", async ({ request }) => {
    const res = await request.delete(`${h.baseUrl}/api/v1/favorites/abc`);
    expect(res.status()).toBe(400);
    expect((await readBody(res)).error).toBe("Favorite id must be a positive integer");
  });

  test("answers unknown routes with a JSON 404", async ({ request }) => {
    const res = await request.get(`${h.baseUrl}/api/v1/nothing-here`);
    expect(res.status()).toBe(404);
    expect(await res.json()).toEqual({
      ok: false,
      error: "Not Found",
      path: "/api/v1/nothing-here",
      method: "GET",
    });
  });
});

test.describe("HTTP API without credentials", () => {
  let h: Harness;

  test.beforeAll(async () => {
    h = await startServer(new FakeVision([], false), new FakeRecipeLlm([], false));
  });

  test.afterAll(async () => {
    await h.close();
  });

  test("reports recipe generation as not configured", async ({ request }) => {
    const res = await request.post(`${h.baseUrl}/api/v1/recipes`, { data: { items: ["egg"] } });
    expect(res.status()).toBe(503);
    expect((await readBody(res)).meta).toEqual({ code: "NOT_CONFIGURED", capability: "generation" });
    expect(h.llm.calls).toHaveLength(0);
  });

  test("reports recognition as not configured", async ({ request }) => {
    const res = await request.post(`${h.baseUrl}/api/v1/recognize`, photo(await solidImage("webp"), "image/webp"));
    expect(res.status()).toBe(503);
    expect((await readBody(res)).meta?.capability).toBe("vision");
    expect(h.vision.calls).toHaveLength(0);
  });
});

test.describe("HTTP API size limit", () => {
  let h: Harness;

  test.beforeAll(async () => {
    h = await startServer(new FakeVision([EGG_AND_MILK]), new FakeRecipeLlm(), testConfig({ MAX_IMAGE_BYTES: "64" }));
  });

  test.afterAll(async () => {
    await h.close();
  });

  test("rejects an oversized photo with 413 before recognition", async ({ request }) => {
    const res = await request.post(`${h.baseUrl}/api/v1/recognize`, photo(await solidImage("jpeg", 32), "image/jpeg"));
    expect(res.status()).toBe(413);
    expect((await readBody(res)).meta?.code).toBe("IMAGE_TOO_LARGE");
    expect(h.vision.calls).toHaveLength(0);
  });
});

test.describe("HTTP API rate limit", () => {
  let h: Harness;

  test.beforeAll(async () => {
    h = await startServer(
      new FakeVision(),
      new FakeRecipeLlm([recipesReply(["A", "B", "C", "D", "E"].map((t) => makeRecipe(t)))]),
      testConfig({ AI_RATE_LIMIT_MAX_REQUESTS: "1" })
    );
  });

  test.afterAll(async () => {
    await h.close();
  });

  test("answers 429 with Retry-After once the AI budget is spent", async ({ request }) => {
    const first = await request.post(`${h.baseUrl}/api/v1/recipes`, { data: { items: ["egg"] } });
    expect(first.status()).toBe(200);

    const second = await request.post(`${h.baseUrl}/api/v1/recipes`, {
      headers: { "X-Forwarded-For": "203.0.113.7" },
      data: { items: ["egg"] },
    });
    expect(second.status()).toBe(429);
    expect(Number(second.headers()["retry-after"])).toBeGreaterThan(0);

    const body = await readBody(second);
    expect(body.error).toBe("AI request rate limit exceeded");
    expect(body.meta?.code).toBe("RATE_LIMITED");
    expect(h.llm.calls).toHaveLength(1);
  });

  test("keeps the general budget for other routes", async ({ request }) => {
    const res = await request.get(`${h.baseUrl}/api/v1/favorites`);
    expect(res.status()).toBe(200);
  });
});

test.describe("HTTP API origin allowlist", () => {
  let h: Harness;

  test.beforeAll(async () => {
    h = await startServer(new FakeVision(), new FakeRecipeLlm(), testConfig({ ALLOWED_ORIGINS: "http://localhost:5173" }));
  });

  test.afterAll(async () => {
    await h.close();
  });

  test("answers an unlisted origin with 403", async ({ request }) => {
    const res = await request.get(`${h.baseUrl}/api/v1/favorites`, { headers: { Origin: "http://elsewhere.example.test" } });
    expect(res.status()).toBe(403);

    const body = await readBody(res);
    expect(body.error).toBe("Origin http://elsewhere.example.test is not allowed");
    expect(body.meta).toEqual({ code: "ORIGIN_NOT_ALLOWED", origin: "http://elsewhere.example.test" });
  });

  test("serves a listed origin with its CORS header", async ({ request }) => {
    const res = await request.get(`${h.baseUrl}/api/v1/favorites`, { headers: { Origin: "http://localhost:5173" } });
    expect(res.status()).toBe(200);
    expect(res.headers()["access-control-allow-origin"]).toBe("http://localhost:5173");
  });
});
