/**
 * Configuration Manager
 *
 * Responsible for:
 * - Loading optional JSON settings
 * - Applying default values per section
 * - Enforcing value ranges
 */

import * as fs from 'fs';
import { ErrorCode } from '../errors/error-codes';
import { ConfigurationError } from '../errors/orchestrator-error';
import { isLogLevel, type LogLevel } from '../logging/workflow-logger';

export type DispatchMode = 'sequential' | 'parallel';

export interface DecompositionConfig {
  max_depth: number;
  max_generic_subtasks: number;
}

/**
 * Minutes assumed per subtask, keyed by complexity tier
 */
export interface ComplexityWeightsConfig {
  simple: number;
  medium: number;
  complex: number;
}

export interface DispatchConfig {
  mode: DispatchMode;
  max_concurrency: number;
}

export interface EventBusConfig {
  history_limit: number;
}

export interface LoggingConfig {
  level: LogLevel;
  max_entries: number;
}

/**
 * Full configuration structure
 */
export interface OrchestratorConfig {
  decomposition: DecompositionConfig;
  complexity_weights: ComplexityWeightsConfig;
  dispatch: DispatchConfig;
  event_bus: EventBusConfig;
  logging: LoggingConfig;
}

/**
 * Partial overrides, one level deep
 */
export type OrchestratorConfigInput = {
  [K in keyof OrchestratorConfig]?: Partial<OrchestratorConfig[K]>;
};

/**
 * Default configuration values
 */
export const DEFAULT_ORCHESTRATOR_CONFIG: Readonly<OrchestratorConfig> = Object.freeze<OrchestratorConfig>({
  decomposition: {
    max_depth: 3,
    max_generic_subtasks: 5,
  },
  complexity_weights: {
    simple: 5,
    medium: 15,
    complex: 30,
  },
  dispatch: {
    mode: 'parallel',
    max_concurrency: 4,
  },
  event_bus: {
    history_limit: 1000,
  },
  logging: {
    level: 'info',
    max_entries: 1000,
  },
});

interface Range {
  min: number;
  max: number;
}

/**
 * Validation ranges
 */
const RANGES = {
  decomposition: {
    max_depth: { min: 0, max: 10 },
    max_generic_subtasks: { min: 1, max: 20 },
  },
  complexity_weights: {
    simple: { min: 1, max: 1440 },
    medium: { min: 1, max: 1440 },
    complex: { min: 1, max: 1440 },
  },
  dispatch: {
    max_concurrency: { min: 1, max: 64 },
  },
  event_bus: {
    history_limit: { min: 1, max: 100000 },
  },
  logging: {
    max_entries: { min: 1, max: 100000 },
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration Manager class
 */
export class ConfigurationManager {
  /**
   * Load configuration from a JSON settings file.
   * Without a path the defaults are returned.
   * @throws ConfigurationError if the file is missing, malformed or out of range
   */
  load(settingsPath?: string): Readonly<OrchestratorConfig> {
    if (settingsPath === undefined) {
      return this.resolve({});
    }

    if (!fs.existsSync(settingsPath)) {
      throw new ConfigurationError(ErrorCode.E101_CONFIG_FILE_NOT_FOUND, settingsPath, {
        settingsPath,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(settingsPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        ErrorCode.E102_CONFIG_PARSE_FAILURE,
        `${settingsPath}: ${reason}`,
        { settingsPath, parseError: reason }
      );
    }

    if (!isRecord(raw)) {
      throw new ConfigurationError(
        ErrorCode.E102_CONFIG_PARSE_FAILURE,
        `${settingsPath}: settings must be a JSON object`,
        { settingsPath }
      );
    }

    return this.resolve(raw);
  }

  /**
   * Merge overrides over the defaults and validate the result
   */
  resolve(input: OrchestratorConfigInput | Record<string, unknown>): Readonly<OrchestratorConfig> {
    const decomposition = this.section(input, 'decomposition');
    const weights = this.section(input, 'complexity_weights');
    const dispatch = this.section(input, 'dispatch');
    const eventBus = this.section(input, 'event_bus');
    const logging = this.section(input, 'logging');
    const defaults = DEFAULT_ORCHESTRATOR_CONFIG;

    const config: OrchestratorConfig = {
      decomposition: {
        max_depth: this.readInteger(
          decomposition,
          'decomposition.max_depth',
          defaults.decomposition.max_depth,
          RANGES.decomposition.max_depth
        ),
        max_generic_subtasks: this.readInteger(
          decomposition,
          'decomposition.max_generic_subtasks',
          defaults.decomposition.max_generic_subtasks,
          RANGES.decomposition.max_generic_subtasks
        ),
      },
      complexity_weights: {
        simple: this.readInteger(
          weights,
          'complexity_weights.simple',
          defaults.complexity_weights.simple,
          RANGES.complexity_weights.simple
        ),
        medium: this.readInteger(
          weights,
          'complexity_weights.medium',
          defaults.complexity_weights.medium,
          RANGES.complexity_weights.medium
        ),
        complex: this.readInteger(
          weights,
          'complexity_weights.complex',
          defaults.complexity_weights.complex,
          RANGES.complexity_weights.complex
        ),
      },
      dispatch: {
        mode: this.readDispatchMode(dispatch, defaults.dispatch.mode),
        max_concurrency: this.readInteger(
          dispatch,
          'dispatch.max_concurrency',
          defaults.dispatch.max_concurrency,
          RANGES.dispatch.max_concurrency
        ),
      },
      event_bus: {
        history_limit: this.readInteger(
          eventBus,
          'event_bus.history_limit',
          defaults.event_bus.history_limit,
          RANGES.event_bus.history_limit
        ),
      },
      logging: {
        level: this.readLogLevel(logging, defaults.logging.level),
        max_entries: this.readInteger(
          logging,
          'logging.max_entries',
          defaults.logging.max_entries,
          RANGES.logging.max_entries
        ),
      },
    };

    return Object.freeze(config);
  }

  getDefaults(): OrchestratorConfig {
    return structuredClone(DEFAULT_ORCHESTRATOR_CONFIG);
  }

  private section(input: object, key: keyof OrchestratorConfig): Record<string, unknown> {
    const value: unknown = Object.prototype.hasOwnProperty.call(input, key)
      ? Reflect.get(input, key)
      : undefined;
    if (value === undefined) {
      return {};
    }
    if (!isRecord(value)) {
      throw new ConfigurationError(
        ErrorCode.E103_CONFIG_VALUE_OUT_OF_RANGE,
        `${key} must be an object`,
        { field: key }
      );
    }
    return value;
  }

  private readInteger(
    section: Record<string, unknown>,
    field: string,
    fallback: number,
    range: Range
  ): number {
    const key = field.slice(field.indexOf('.') + 1);
    const value = section[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < range.min || value > range.max) {
      throw new ConfigurationError(
        ErrorCode.E103_CONFIG_VALUE_OUT_OF_RANGE,
        `${field} must be an integer between ${range.min} and ${range.max}, got ${String(value)}`,
        { field, value, range }
      );
    }
    return value;
  }

  private readDispatchMode(section: Record<string, unknown>, fallback: DispatchMode): DispatchMode {
    const value = section['mode'];
    if (value === undefined) {
      return fallback;
    }
    if (value !== 'sequential' && value !== 'parallel') {
      throw new ConfigurationError(
        ErrorCode.E103_CONFIG_VALUE_OUT_OF_RANGE,
        `dispatch.mode must be "sequential" or "parallel", got ${String(value)}`,
        { field: 'dispatch.mode', value }
      );
    }
    return value;
  }

  private readLogLevel(section: Record<string, unknown>, fallback: LogLevel): LogLevel {
    const value = section['level'];
    if (value === undefined) {
      return fallback;
    }
    if (!isLogLevel(value)) {
      throw new ConfigurationError(
        ErrorCode.E103_CONFIG_VALUE_OUT_OF_RANGE,
        `logging.level must be one of debug, info, warn, error, got ${String(value)}`,
        { field: 'logging.level', value }
      );
    }
    return value;
  }
}
