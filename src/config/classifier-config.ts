import Joi from 'joi';

import { EventTypeFilter } from '../core/events';
import { LogLevel, logWarn } from '../utils/utils';

interface EnvironmentVariables {
  NODE_ENV: string;
  LOG_LEVEL: LogLevel;
  NAMESPACE: string;
  CONTEXT: string;
  RULES_FILE: string;
  EVENT_TYPE_FILTER: EventTypeFilter;
  EVENT_LIMIT: number;
  INCLUDE_OBSERVED_AT: boolean;
  KUBECONFIG_PATH: string;
}

/**
 * Environment variable validation schema for the workload-issues CLI.
 * Every variable is optional; command-line options take precedence.
 */
const environmentSchema = Joi.object<EnvironmentVariables>({
  // ====================================
  // APPLICATION CONFIGURATION
  // ====================================
  NODE_ENV: Joi.string()
    .default('development')
    .description('Node.js environment mode'),

  LOG_LEVEL: Joi.string()
    .lowercase()
    .valid('error', 'warn', 'info', 'debug')
    .default('warn')
    .description('Verbosity of diagnostics written to stderr'),

  // ====================================
  // CLASSIFICATION CONTEXT
  // ====================================
  NAMESPACE: Joi.string()
    .allow('')
    .default('')
    .pattern(/^[a-z0-9-]*$/)
    .messages({
      'string.pattern.base': 'NAMESPACE must be a valid namespace name (lowercase, numbers, hyphens only)',
    })
    .description('Namespace interpolated into suggested next steps'),

  CONTEXT: Joi.string()
    .allow('')
    .default('')
    .description('Cluster context interpolated into escalation steps'),

  RULES_FILE: Joi.string()
    .allow('')
    .default('')
    .description('Path to a custom rule table (empty for the bundled table)'),

  INCLUDE_OBSERVED_AT: Joi.boolean()
    .default(false)
    .description('Stamp each issue with a timestamp taken from the messages'),

  // ====================================
  // CLUSTER EVENT COLLECTION
  // ====================================
  EVENT_TYPE_FILTER: Joi.string()
    .valid('Warning', 'Normal', 'All')
    .default('Warning')
    .description('Event type collected by the scan command'),

  EVENT_LIMIT: Joi.number()
    .integer()
    .min(1)
    .max(1000)
    .default(100)
    .description('Maximum number of events fed to the classifier by the scan command'),

  KUBECONFIG_PATH: Joi.string()
    .allow('')
    .default('')
    .description('Custom kubeconfig path (empty for default)'),
}).required();

interface ValidationResult {
  isValid: boolean;
  config?: ValidatedConfig;
  errors?: string[];
  invalidVariables?: string[];
}

export interface LoadOptions {
  /** Replace invalid variables with their defaults instead of throwing. */
  lenient?: boolean;
}

export interface ValidatedConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  classification: {
    namespace: string;
    context: string;
    rulesFile?: string;
    includeObservedAt: boolean;
  };
  events: {
    typeFilter: EventTypeFilter;
    limit: number;
    kubeconfigPath?: string;
  };
}

export class ClassifierConfig {
  private constructor(private readonly validatedConfig: ValidatedConfig) {}

  /**
   * Validates environment variables and creates a ClassifierConfig instance.
   * In lenient mode every invalid variable is logged and falls back to its
   * default.
   *
   * @throws {Error} When validation fails with detailed error messages
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env, options: LoadOptions = {}): ClassifierConfig {
    let result = this.validateEnvironment(env);

    if (!result.isValid && options.lenient) {
      (result.errors || []).forEach((error) => logWarn(`Ignoring invalid setting, using its default. ${error}`));
      result = this.validateEnvironment(withoutVariables(env, result.invalidVariables || []));
    }

    if (!result.isValid || !result.config) {
      const errorMessage = [
        'Environment variable validation failed:',
        '',
        ...(result.errors || []).map((error) => `  • ${error}`),
        '',
        '💡 Check your .env file and ensure all variables are properly set.',
      ].join('\n');

      throw new Error(errorMessage);
    }

    return new ClassifierConfig(result.config);
  }

  private static validateEnvironment(env: NodeJS.ProcessEnv): ValidationResult {
    const result = environmentSchema.validate(env, {
      allowUnknown: true,
      stripUnknown: false,
      abortEarly: false,
      convert: true,
    });

    if (result.error) {
      return {
        isValid: false,
        errors: result.error.details.map((detail) => `${detail.path.join('.')}: ${detail.message}`),
        invalidVariables: result.error.details.map((detail) => String(detail.path[0])),
      };
    }

    const value = result.value;

    return {
      isValid: true,
      config: {
        nodeEnv: value.NODE_ENV,
        logLevel: value.LOG_LEVEL,
        classification: {
          namespace: value.NAMESPACE,
          context: value.CONTEXT,
          rulesFile: value.RULES_FILE || undefined,
          includeObservedAt: value.INCLUDE_OBSERVED_AT,
        },
        events: {
          typeFilter: value.EVENT_TYPE_FILTER,
          limit: value.EVENT_LIMIT,
          kubeconfigPath: value.KUBECONFIG_PATH || undefined,
        },
      },
    };
  }

  getClassificationConfig() {
    return this.validatedConfig.classification;
  }

  getEventsConfig() {
    return this.validatedConfig.events;
  }

  getAppConfig() {
    return {
      nodeEnv: this.validatedConfig.nodeEnv,
      logLevel: this.validatedConfig.logLevel,
    };
  }
}

function withoutVariables(env: NodeJS.ProcessEnv, names: string[]): NodeJS.ProcessEnv {
  const remaining = { ...env };
  names.forEach((name) => delete remaining[name]);
  return remaining;
}
