export {
  ConfigurationManager,
  DEFAULT_ORCHESTRATOR_CONFIG,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
  type DecompositionConfig,
  type ComplexityWeightsConfig,
  type DispatchConfig,
  type DispatchMode,
  type EventBusConfig,
  type LoggingConfig,
} from './configuration-manager';
