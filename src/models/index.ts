import type { Database } from "../config/databaseConnection";
import { createChirpModel } from "./chirp.model";
import { createRefreshTokenModel } from "./refreshToken.model";
import type { Store } from "./types";
import { createUserModel } from "./user.model";

export const createDrizzleStore = (db: Database): Store => ({
  users: createUserModel(db),
  chirps: createChirpModel(db),
  refreshTokens: createRefreshTokenModel(db),
});

export { createMemoryStore } from "./memory.model";
export type {
  Chirp,
  ChirpModel,
  CreateChirpInput,
  CreateRefreshTokenInput,
  CreateUserInput,
  ListChirpsInput,
  RefreshToken,
  RefreshTokenModel,
  SortOrder,
  Store,
  User,
  UserModel,
} from "./types";
