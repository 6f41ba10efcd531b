import type { IncomingHttpHeaders } from "http";
import { CredentialError } from "./errors";

const BEARER_PREFIX = "Bearer ";
const API_KEY_PREFIX = "ApiKey ";

// Both schemes share the Authorization header; the prefix is case-sensitive
const extractCredential = (
  headers: IncomingHttpHeaders,
  prefix: string
): string => {
  const value = headers.authorization;
  if (!value) {
    throw new CredentialError("MissingCredential", "missing Authorization header");
  }
  if (!value.startsWith(prefix)) {
    throw new CredentialError(
      "MalformedCredential",
      `Authorization header must start with '${prefix}'`
    );
  }
  return value.slice(prefix.length);
};

export const getBearerToken = (headers: IncomingHttpHeaders): string =>
  extractCredential(headers, BEARER_PREFIX);

export const getApiKey = (headers: IncomingHttpHeaders): string =>
  extractCredential(headers, API_KEY_PREFIX);
