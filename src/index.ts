import 'dotenv/config';
import { loadConfig, type Config } from './config/env';
import type { VectorStore } from './domain/repositories/VectorStore';
import { IndexingService } from './domain/services/IndexingService';
import { QuizService } from './domain/services/QuizService';
import { RagService } from './domain/services/RagService';
import { IndexCourseFromMoodleUseCase } from './application/usecases/IndexCourseFromMoodle';
import { IngestFileUseCase } from './application/usecases/IngestFile';
import { OpenAIProvider } from './infrastructure/ai/OpenAIProvider';
import { OpenAIEmbeddingProvider } from './infrastructure/ai/OpenAIEmbeddingProvider';
import { HttpServer } from './infrastructure/api/HttpServer';
import { MoodleClient } from './infrastructure/moodle/MoodleClient';
import { InMemoryVectorStore } from './infrastructure/vectorstore/InMemoryVectorStore';
import { LanceVectorStore } from './infrastructure/vectorstore/LanceVectorStore';
import { errorMessage, log, setLogLevel } from './utils/logger';

async function createVectorStore(config: Config): Promise<VectorStore> {
  if (config.vectorStore.backend === 'memory') {
    log('warn', 'Using in-memory vector store: indexes are lost on restart');
    return new InMemoryVectorStore();
  }
  return LanceVectorStore.connect(config.vectorStore.lancedbPath);
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log('info', 'Starting course assistant...', {
    model: config.llm.model,
    embeddingModel: config.embedding.model,
    vectorStore: config.vectorStore.backend,
  });

  const embeddingProvider = new OpenAIEmbeddingProvider({
    apiKey: config.embedding.apiKey,
    baseUrl: config.embedding.baseUrl,
    model: config.embedding.model,
    dimension: config.embedding.dimension,
    timeoutMs: config.embedding.timeoutMs,
  });
  const vectorStore = await createVectorStore(config);

  const completionProvider = new OpenAIProvider({
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.model,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    timeoutMs: config.llm.timeoutMs,
  });

  // Services
  const indexingService = new IndexingService(vectorStore, embeddingProvider, {
    chunkSize: config.rag.chunkSize,
    chunkOverlap: config.rag.chunkOverlap,
  });
  const ragService = new RagService(vectorStore, embeddingProvider, completionProvider, indexingService, {
    topK: config.rag.topK,
    searchTimeoutMs: config.vectorStore.searchTimeoutMs,
  });
  const quizService = new QuizService(completionProvider);

  // Use cases
  const { moodle } = config;
  const moodleClient =
    moodle.url && moodle.token
      ? new MoodleClient({
          url: moodle.url,
          token: moodle.token,
          extractPages: moodle.extractPages,
          extractFiles: moodle.extractFiles,
          maxFileSizeMb: moodle.maxFileSizeMb,
        })
      : null;

  if (moodleClient) {
    log('info', 'Moodle extraction enabled', { url: moodle.url });
  } else {
    log('info', 'Moodle extraction not configured (MOODLE_URL or MOODLE_TOKEN not set)');
  }

  const server = new HttpServer(
    {
      ragService,
      quizService,
      indexingService,
      ingestFile: new IngestFileUseCase(indexingService),
      indexCourseFromMoodle: moodleClient ? new IndexCourseFromMoodleUseCase(moodleClient, indexingService) : null,
      health: () => ({
        model: config.llm.model,
        embedding_model: config.embedding.model,
        embedding_dimension: embeddingProvider.dimension,
        vector_store: vectorStore.name,
        moodle_configured: moodleClient !== null,
      }),
    },
    config.port
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    log('info', `Received ${signal}, shutting down gracefully...`);

    try {
      await server.stop();
      await vectorStore.close?.();
      log('info', 'Shutdown complete');
      process.exit(0);
    } catch (error) {
      log('error', 'Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.start();
}

main().catch((error) => {
  log('error', 'Fatal error', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
