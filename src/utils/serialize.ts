import type { Chirp, User } from "../models/types";

export interface UserResponse {
  id: string;
  created_at: string;
  updated_at: string;
  email: string;
  is_chirpy_red: boolean;
}

export interface ChirpResponse {
  id: string;
  created_at: string;
  updated_at: string;
  body: string;
  user_id: string;
}

// never includes the password hash
export const toUserResponse = (user: User): UserResponse => ({
  id: user.id,
  created_at: user.createdAt.toISOString(),
  updated_at: user.updatedAt.toISOString(),
  email: user.email,
  is_chirpy_red: user.isChirpyRed,
});

export const toChirpResponse = (chirp: Chirp): ChirpResponse => ({
  id: chirp.id,
  created_at: chirp.createdAt.toISOString(),
  updated_at: chirp.updatedAt.toISOString(),
  body: chirp.body,
  user_id: chirp.userId,
});
