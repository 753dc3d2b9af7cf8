import request from "supertest";
import { describe, expect, it } from "vitest";
import { createTestApp } from "../helpers/testApp.js";

describe("app", () => {
  it("answers unknown routes with 404", async () => {
    const { app } = createTestApp();

    const response = await request(app).get("/api/unknown");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Route not found" });
  });

  it("rejects malformed JSON bodies", async () => {
    const { app } = createTestApp();

    const response = await request(app)
      .post("/api/chat")
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "Malformed JSON body" });
  });

  it("sends CORS headers for the configured origin", async () => {
    const { app } = createTestApp({ CORS_ORIGIN: "http://localhost:5173" });

    const response = await request(app)
      .get("/api/simulation/run")
      .set("Origin", "http://localhost:5173");

    expect(response.status).toBe(200);
    expect(response.headers["access-control-allow-origin"]).toBe("http://localhost:5173");
  });

  it("applies the rate limit", async () => {
    const { app } = createTestApp({ RATE_LIMIT_MAX: "2" });

    await request(app).get("/api/simulation/run");
    await request(app).get("/api/simulation/run");
    const limited = await request(app).get("/api/simulation/run");

    expect(limited.status).toBe(429);
  });
});
