import request from "supertest";
import { describe, expect, it } from "vitest";
import { buildTestApp, registerAndLogin, TEST_POLKA_KEY } from "../test-helpers/app";

const MISSING_ID = "7d9e2c1a-4b3f-4e8d-a1c2-3b4d5e6f7a8b";

describe("POST /api/polka/webhooks", () => {
  const upgraded = (userId: string) => ({ event: "user.upgraded", data: { user_id: userId } });

  it("upgrades the user to Chirpy Red", async () => {
    const { app } = buildTestApp();
    const session = await registerAndLogin(app, "u1@example.com");

    const response = await request(app)
      .post("/api/polka/webhooks")
      .set("Authorization", `ApiKey ${TEST_POLKA_KEY}`)
      .send(upgraded(session.id));
    expect(response.status).toBe(204);

    const login = await request(app)
      .post("/api/login")
      .send({ email: "u1@example.com", password: "password123" });
    expect(login.body.is_chirpy_red).toBe(true);
  });

  it("acknowledges other events without touching the user", async () => {
    const { app, context } = buildTestApp();
    const session = await registerAndLogin(app, "u1@example.com");

    const response = await request(app)
      .post("/api/polka/webhooks")
      .set("Authorization", `ApiKey ${TEST_POLKA_KEY}`)
      .send({ event: "user.payment_failed", data: { user_id: session.id } });

    expect(response.status).toBe(204);
    expect((await context.store.users.findById(session.id))?.isChirpyRed).toBe(false);
  });

  it.each([
    ["no header", undefined],
    ["a wrong key", "ApiKey wrong-key"],
    ["the key as a bearer token", `Bearer ${TEST_POLKA_KEY}`],
  ])("rejects %s", async (_label, header) => {
    const { app } = buildTestApp();

    const req = request(app).post("/api/polka/webhooks");
    if (header) {
      req.set("Authorization", header);
    }
    const response = await req.send(upgraded(MISSING_ID));

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: "Invalid or missing API key" });
  });

  it("answers 404 for an unknown user", async () => {
    const { app } = buildTestApp();

    const response = await request(app)
      .post("/api/polka/webhooks")
      .set("Authorization", `ApiKey ${TEST_POLKA_KEY}`)
      .send(upgraded(MISSING_ID));

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "User not found" });
  });

  it.each([
    [{ event: "user.upgraded", data: { user_id: "nope" } }, "Invalid user_id"],
    [{ event: "user.upgraded" }, "Event data is required"],
    [{ data: {} }, "Event is required"],
  ])("rejects payload %j", async (payload, error) => {
    const { app } = buildTestApp();

    const response = await request(app)
      .post("/api/polka/webhooks")
      .set("Authorization", `ApiKey ${TEST_POLKA_KEY}`)
      .send(payload);

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error });
  });
});
