import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";

export const API_KEY_ENV = "OPENAI_API_KEY";
export const BASE_URL_ENV = "OPENAI_BASE_URL";

const API_KEY_HELP = "See: https://docs.aws.amazon.com/bedrock/latest/userguide/api-keys.html";
const BASE_URL_HELP = "Example: https://bedrock-mantle.us-east-1.api.aws/v1";

/**
 * Connection settings for the inference endpoint, resolved once at start-up
 * and handed to whatever needs to talk to the endpoint.
 */
export interface ClientConfig {
  apiKey: string;
  baseUrl: string;
}

// Empty strings count as unset.
const presentString = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const EnvSchema = z.object({
  [API_KEY_ENV]: presentString,
  [BASE_URL_ENV]: presentString,
});

/**
 * Build the client configuration from environment variables.
 * Throws ConfigError naming the first missing variable.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = EnvSchema.parse(env);
  const apiKey = parsed[API_KEY_ENV];
  const baseUrl = parsed[BASE_URL_ENV];

  if (!apiKey) {
    throw new ConfigError(
      `${API_KEY_ENV} is required. Set it in .env file or as environment variable.\n${API_KEY_HELP}`,
    );
  }
  if (!baseUrl) {
    throw new ConfigError(
      `${BASE_URL_ENV} is required. Set it in .env file or as environment variable.\n${BASE_URL_HELP}`,
    );
  }

  return { apiKey, baseUrl };
}

/**
 * Load a .env file from the working directory into process.env.
 * Variables already set in the environment are left alone.
 */
export function loadEnvFile(path?: string): void {
  loadDotenv(path ? { path } : {});
}
