export {
  ACTION_TOKEN_PREFIX,
  ActionTokenError,
  RATINGS,
  decodeActionToken,
  encodeActionToken,
  isRating,
  ratingScore,
} from "./actions/actionToken.js";
export type { ActionToken, ActionVerb, Rating } from "./actions/actionToken.js";
export { PROMOTE_LABEL, buildPromoteControl, buildRatingControls } from "./actions/controls.js";

export {
  DEFAULT_RENDER_BASE_URL,
  DEFAULT_RENDER_TIMEOUT_MS,
  resetTagBreederConfigCache,
  resolveRenderServiceConfig,
  resolveTagBreederConfig,
} from "./config.js";
export type { RenderServiceConfig, TagBreederConfig } from "./config.js";

export {
  DEFAULT_GENOME_LENGTH,
  MIN_GENOME_LENGTH,
  deriveEvolutionConstants,
} from "./evolution/constants.js";
export type { EvolutionConstants } from "./evolution/constants.js";
export {
  HIGHEST_FITNESS,
  LOWEST_FITNESS,
  SHUTDOWN_FITNESS,
  createFitnessStore,
} from "./evolution/fitnessStore.js";
export type { FitnessStore, Score } from "./evolution/fitnessStore.js";
export {
  GenomeDecodeError,
  GenomeRangeError,
  MAX_GENE_VALUE,
  PHENOTYPE_SEPARATOR,
  decodeGenome,
  encodeGenome,
  genomeKey,
  genomeToPhenotype,
  isGenomeInRange,
  randomGenome,
} from "./evolution/genome.js";
export type { Genome, PhenotypeAffixes, TagTable } from "./evolution/genome.js";
export {
  bestOf,
  crossover,
  mutate,
  rankByFitness,
  reinsertElitist,
  selectParents,
} from "./evolution/operators.js";
export type { RandomSource, ScoredGenome } from "./evolution/operators.js";
export { runEvolution } from "./evolution/simulation.js";
export type {
  EvolutionOptions,
  EvolutionResult,
  GenerationSnapshot,
} from "./evolution/simulation.js";

export {
  FEEDBACK_POLL_INTERVAL_MS,
  runFeedbackIteration,
  runFeedbackLoop,
} from "./feedback/feedbackLoop.js";
export type { FeedbackLoopOptions } from "./feedback/feedbackLoop.js";

export {
  BaseGenerationParametersSchema,
  GENERATION_LIMITS,
  GenerationModelSchema,
  extractModelKeywords,
  fitResolution,
  prepareGeneration,
  prependModelKeyword,
} from "./render/parameters.js";
export type {
  BaseGenerationParameters,
  GenerationModel,
  PrepareGenerationOptions,
  PreparedGeneration,
} from "./render/parameters.js";
export {
  PLACEHOLDER_SEED,
  PROGRESS_UPDATE_MS,
  awaitRenderWithProgress,
  loadPlaceholderImage,
  renderWithFallback,
} from "./render/render.js";
export type {
  RenderClient,
  RenderJob,
  RenderProgress,
  RenderResult,
  RenderedImage,
} from "./render/types.js";
export {
  RenderServiceError,
  buildTextToImageBody,
  createWebUiRenderClient,
} from "./render/webui.js";
export type { RenderFetch, WebUiRenderClientOptions } from "./render/webui.js";

export { imageFilename } from "./session/channel.js";
export type {
  ControlStyle,
  MessageControl,
  OutboundImage,
  OutboundMessage,
  SessionChannel,
} from "./session/channel.js";
export { MAX_GENOME_LENGTH, SessionRegistry, SessionSettingsSchema } from "./session/registry.js";
export type {
  ActionOutcome,
  SessionRegistryOptions,
  SessionSettings,
  StartSessionRequest,
} from "./session/registry.js";
export { EvolutionSession, SessionError, describeRating } from "./session/session.js";
export type {
  PromoteOptions,
  PromotionResult,
  RatingOutcome,
  SessionErrorKind,
  SessionOptions,
} from "./session/session.js";
export {
  BUNDLED_TAGS_SOURCE,
  TagTableError,
  loadTagTable,
  parseTagList,
  validateTagTable,
} from "./session/tagTable.js";
export type { LoadTagTableOptions, LoadedTagTable, TagTextFetch } from "./session/tagTable.js";

export {
  createConsoleTelemetrySink,
  createSessionTelemetry,
  formatTelemetryEvent,
} from "./telemetry.js";
export type {
  SessionTelemetry,
  SessionTelemetryEvent,
  SessionTelemetryPayload,
  SessionTelemetrySink,
} from "./telemetry.js";

export { loadEnvFromFile, loadLocalEnv } from "./utils/env.js";
