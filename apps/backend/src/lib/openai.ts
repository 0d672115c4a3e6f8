import OpenAI from "openai";
import { env } from "../config/env.js";
import { ApiError } from "../utils/errors.js";

let client: OpenAI | null = null;

export const isAiConfigured = () => Boolean(env.OPENAI_API_KEY);

export const getOpenAi = () => {
  if (!env.OPENAI_API_KEY) {
    throw new ApiError(503, "AI service is not configured");
  }
  if (!client) {
    client = new OpenAI({ apiKey: env.OPENAI_API_KEY });
  }
  return client;
};
