type Env = Record<string, string | undefined>;

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvOrNull(env: Env, key: string): string | null {
  return env[key] || null;
}

function getEnvAsNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvAsBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

export type VectorStoreName = 'memory' | 'lancedb';

function parseVectorStore(value: string): VectorStoreName {
  if (value === 'memory' || value === 'lancedb') {
    return value;
  }
  throw new Error(`Unknown VECTOR_STORE: ${value}`);
}

export function loadConfig(env: Env = process.env) {
  return {
    port: getEnvAsNumber(env, 'PORT', 8080),
    logLevel: getEnvOrDefault(env, 'LOG_LEVEL', 'info'),

    // Completion provider (any OpenAI-compatible endpoint: Groq, OpenAI, OpenRouter)
    llm: {
      apiKey: getEnvOrDefault(env, 'LLM_API_KEY', 'not-needed'),
      baseUrl: getEnvOrDefault(env, 'LLM_BASE_URL', 'https://api.groq.com/openai/v1'),
      model: getEnvOrDefault(env, 'LLM_MODEL', 'llama-3.1-8b-instant'),
      temperature: getEnvAsNumber(env, 'LLM_TEMPERATURE', 0.3),
      maxTokens: getEnvAsNumber(env, 'LLM_MAX_TOKENS', 1500),
      timeoutMs: getEnvAsNumber(env, 'LLM_TIMEOUT_MS', 60000),
    },

    // Any OpenAI-compatible embeddings endpoint; dimension must match the model
    embedding: {
      model: getEnvOrDefault(env, 'EMBEDDING_MODEL', 'text-embedding-3-small'),
      apiKey: getEnvOrDefault(env, 'EMBEDDING_API_KEY', 'not-needed'),
      baseUrl: getEnvOrDefault(env, 'EMBEDDING_BASE_URL', 'https://api.openai.com/v1'),
      dimension: getEnvAsNumber(env, 'EMBEDDING_DIMENSION', 1536),
      timeoutMs: getEnvAsNumber(env, 'EMBEDDING_TIMEOUT_MS', 30000),
    },

    vectorStore: {
      backend: parseVectorStore(getEnvOrDefault(env, 'VECTOR_STORE', 'lancedb')),
      lancedbPath: getEnvOrDefault(env, 'LANCEDB_PATH', './data/lancedb'),
      searchTimeoutMs: getEnvAsNumber(env, 'SEARCH_TIMEOUT_MS', 10000),
    },

    rag: {
      chunkSize: getEnvAsNumber(env, 'CHUNK_SIZE', 1000),
      chunkOverlap: getEnvAsNumber(env, 'CHUNK_OVERLAP', 200),
      topK: getEnvAsNumber(env, 'RAG_TOP_K', 5),
    },

    // Extraction is disabled when URL or token is missing
    moodle: {
      url: getEnvOrNull(env, 'MOODLE_URL'),
      token: getEnvOrNull(env, 'MOODLE_TOKEN'),
      extractPages: getEnvAsBoolean(env, 'MOODLE_EXTRACT_PAGES', true),
      extractFiles: getEnvAsBoolean(env, 'MOODLE_EXTRACT_FILES', true),
      maxFileSizeMb: getEnvAsNumber(env, 'MOODLE_MAX_FILE_SIZE_MB', 50),
    },
  };
}

export type Config = ReturnType<typeof loadConfig>;
