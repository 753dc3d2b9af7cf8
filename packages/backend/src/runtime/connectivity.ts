import type { ServiceConnectionStatus } from "@convomem/shared";
import type { AppConfig } from "../config.js";
import type { TextCompletion } from "../services/llmTypes.js";

export function isNeo4jConfigured(config: AppConfig): boolean {
  return (
    config.NEO4J_URI.trim().length > 0 &&
    config.NEO4J_USER.trim().length > 0 &&
    config.NEO4J_PASSWORD.trim().length > 0
  );
}

export function isLlmConfigured(config: AppConfig): boolean {
  return config.LLM_BASE_URL.trim().length > 0 && config.LLM_MODEL.trim().length > 0;
}

export function neo4jConnectionStatus(
  config: AppConfig,
  storeReachable: boolean
): ServiceConnectionStatus {
  if (!isNeo4jConfigured(config)) {
    return "not_configured";
  }
  return storeReachable ? "ok" : "failed";
}

export async function checkLlmConnection(options: {
  config: AppConfig;
  completion: TextCompletion;
}): Promise<ServiceConnectionStatus> {
  if (!isLlmConfigured(options.config)) {
    return "not_configured";
  }

  try {
    await options.completion.ping();
    return "ok";
  } catch {
    return "failed";
  }
}
