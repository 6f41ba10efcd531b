import request from "supertest";
import type { Application } from "express";
import { loadConfig } from "../config/env";
import { createContext, type AppContext } from "../context";
import { createApp } from "../index";
import { createMemoryStore, type Store } from "../models";

export const TEST_JWT_SECRET = "test-secret";
export const TEST_POLKA_KEY = "test-polka-key";

export const testEnv = (overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => ({
  NODE_ENV: "test",
  PLATFORM: "dev",
  STORAGE_DRIVER: "memory",
  JWT_SECRET: TEST_JWT_SECRET,
  POLKA_KEY: TEST_POLKA_KEY,
  ...overrides,
});

export interface TestAppOptions {
  env?: NodeJS.ProcessEnv;
  store?: Store;
}

export const buildTestApp = ({ env, store }: TestAppOptions = {}): {
  app: Application;
  context: AppContext;
} => {
  const context = createContext(loadConfig(testEnv(env)), store ?? createMemoryStore());
  return { app: createApp(context), context };
};

export interface TestSession {
  id: string;
  token: string;
  refreshToken: string;
}

export async function registerAndLogin(
  app: Application,
  email: string,
  password: string = "password123"
): Promise<TestSession> {
  const register = await request(app).post("/api/users").send({ email, password });
  if (register.status !== 201) {
    throw new Error(`Failed to register ${email}: ${register.status}`);
  }

  const login = await request(app).post("/api/login").send({ email, password });
  if (login.status !== 200) {
    throw new Error(`Failed to log in ${email}: ${login.status}`);
  }

  return {
    id: login.body.id,
    token: login.body.token,
    refreshToken: login.body.refresh_token,
  };
}
