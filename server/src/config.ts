export interface LlmConfig {
  baseUrl: string;
  model: string;
  apiKey: string;
}

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  historyDir: string;
  logLevel: string;
  autoplayMaxSteps: number;
  llm: LlmConfig;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: positiveInt(env.PORT, 3001),
    corsOrigin: env.CORS_ORIGIN || '*',
    historyDir: env.HISTORY_DIR || 'history',
    logLevel: env.LOG_LEVEL || 'INFO',
    autoplayMaxSteps: positiveInt(env.AUTOPLAY_MAX_STEPS, 100),
    llm: {
      baseUrl: env.LLM_BASE_URL || 'https://api.openai.com/v1',
      model: env.LLM_MODEL || 'gpt-4o',
      apiKey: env.LLM_API_KEY || '',
    },
  };
}
