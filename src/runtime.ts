import { createAdapterFromString } from './adapters/index.js';
import type { AdapterEnv, LanguageModel } from './adapters/index.js';
import { loadConfig, resolveDataPath } from './config/index.js';
import type { Config } from './config/index.js';
import { RecommendationContextBuilder } from './core/context-builder.js';
import { FeedbackProcessor } from './feedback/processor.js';
import { FeedbackService } from './feedback/service.js';
import { WorkerPool } from './feedback/pool.js';
import { LocalKnowledgeBase } from './knowledge/local.js';
import type { KnowledgeRetriever } from './knowledge/types.js';
import { createLogger } from './logging/index.js';
import type { Logger } from './logging/index.js';
import { createEmbedder } from './memory/embeddings.js';
import type { Embedder } from './memory/embeddings.js';
import { createEvictionPolicy } from './memory/eviction.js';
import { MemoryExtractor } from './memory/extractor.js';
import { MemoryRetriever } from './memory/retriever.js';
import { MemoryStore } from './memory/store.js';
import { RecommendationStore } from './recommendations/store.js';

export interface RuntimeOptions {
  projectRoot?: string;
  config?: Config;
  env?: AdapterEnv;
  logger?: Logger;
  // Capabilities can be handed in instead of built from config
  languageModel?: LanguageModel;
  embedder?: Embedder;
  knowledge?: KnowledgeRetriever | null;
  clock?: () => Date;
}

/**
 * Every service of a project, wired from its config
 */
export interface Runtime {
  config: Config;
  logger: Logger;
  languageModel: LanguageModel;
  embedder: Embedder;
  knowledge: KnowledgeRetriever | null;
  memories: MemoryStore;
  retriever: MemoryRetriever;
  extractor: MemoryExtractor;
  recommendations: RecommendationStore;
  processor: FeedbackProcessor;
  feedback: FeedbackService;
  contextBuilder: RecommendationContextBuilder;
  close(): Promise<void>;
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const config = options.config ?? loadConfig(options.projectRoot);
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger({ level: config.logging.level });
  const dataPath = (relative: string) => resolveDataPath(relative, options.projectRoot);

  const languageModel = options.languageModel ?? lazyLanguageModel(
    `${config.model.provider}:${config.model.name}`,
    () => createAdapterFromString(`${config.model.provider}:${config.model.name}`, env, config.model.baseUrl)
  );

  const embedder = options.embedder ?? await createEmbedder({
    provider: config.embeddings.provider,
    model: config.embeddings.model,
    baseUrl: config.embeddings.baseUrl ?? (config.embeddings.provider === 'ollama' ? env.OLLAMA_HOST : undefined),
    openaiApiKey: env.OPENAI_API_KEY,
  });

  let knowledge: KnowledgeRetriever | null = null;
  if (options.knowledge !== undefined) {
    knowledge = options.knowledge;
  } else if (config.knowledge.file) {
    knowledge = await LocalKnowledgeBase.fromFile(dataPath(config.knowledge.file));
  }

  const memories = await MemoryStore.load(dataPath(config.memory.file), {
    maxItems: config.memory.maxItems,
    embedder,
    evictionPolicy: createEvictionPolicy(config.memory.evictionPolicy),
    autoSave: config.memory.autoSave,
    logger,
  });

  const recommendations = await RecommendationStore.open(dataPath(config.recommendations.dir), {
    logger,
    clock: options.clock,
  });

  const retriever = new MemoryRetriever(memories, embedder);
  const extractor = new MemoryExtractor(languageModel, {
    temperature: config.extractor.temperature,
    maxTokens: config.extractor.maxTokens,
    logger,
  });

  const processor = new FeedbackProcessor({
    recommendations,
    memories,
    extractor,
    logger,
    extractionTimeoutMs: config.feedback.extractionTimeoutMs,
  });

  const feedback = new FeedbackService({
    processor,
    pool: new WorkerPool({ maxWorkers: config.feedback.maxWorkers }),
    logger,
    solubilityWarnCeiling: config.feedback.solubilityWarnCeiling,
    clock: options.clock,
  });

  const contextBuilder = new RecommendationContextBuilder(
    retriever,
    knowledge,
    { memoryTopK: config.memory.retrievalTopK },
    logger
  );

  logger.debug('Runtime ready', {
    model: languageModel.name,
    embedder: embedder.name,
    memories: memories.size,
  });

  return {
    config,
    logger,
    languageModel,
    embedder,
    knowledge,
    memories,
    retriever,
    extractor,
    recommendations,
    processor,
    feedback,
    contextBuilder,
    async close() {
      await feedback.close();
      // Without autoSave nothing reaches the disk until now
      if (!config.memory.autoSave) {
        await memories.save();
      }
    },
  };
}

/**
 * Defer building the provider adapter until the first call, so commands that
 * never generate text do not need its API key.
 */
function lazyLanguageModel(name: string, create: () => LanguageModel): LanguageModel {
  let model: LanguageModel | null = null;
  return {
    name,
    async generate(prompt, options) {
      model ??= create();
      return model.generate(prompt, options);
    },
  };
}
