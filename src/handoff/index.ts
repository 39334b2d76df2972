// Recognizer
export {
  createKeywordHandoffRecognizer,
  DEFAULT_HANDOFF_RECOGNIZER_CONFIG,
  HandoffTargets,
  handoffRecognizerConfigSchema,
} from './recognizer.js';
export type {
  HandoffRecognizerConfig,
  HandoffRequestRecognizer,
  HandoffTarget,
  TransferTarget,
} from './recognizer.js';

// Coordinator
export { createConversationControlCoordinator } from './coordinator.js';
export type {
  ConversationControlCoordinator,
  ConversationControlCoordinatorDeps,
  HandoffOutcome,
} from './coordinator.js';
