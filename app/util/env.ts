import 'reflect-metadata';
import _ from 'lodash';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import { IsBoolean, IsIn, IsInt, IsNotEmpty, Matches, Max, Min, ValidationError, validateSync } from 'class-validator';
import { ConfigurationError } from './errors';
import { isBoolean, isFloat, isInteger, listToText, parseBoolean } from './string';

// The application logger is configured from this module, so env problems are reported
// through a bare console logger
const logger = winston.createLogger({
  transports: [
    new winston.transports.Console(),
  ],
});

//
// env module
// Sets up the configuration of the STAC API server from the env-defaults file next to this
// module, an optional .env file and process.env (in increasing order of precedence)
//

export type ConfigValue = number | string | boolean;

export const memorySizeRegex = /^\d+(\.\d+)?\s*(b|kb|mb|gb)$/i;
export const logLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Parse a string env variable to a boolean or number if necessary.
 *
 * @param stringValue - The environment variable value as a string
 * @returns the parsed value
 */
export function makeConfigVar(stringValue: string): ConfigValue {
  if (isInteger(stringValue)) {
    return parseInt(stringValue, 10);
  } else if (isFloat(stringValue)) {
    return parseFloat(stringValue);
  } else if (isBoolean(stringValue)) {
    return parseBoolean(stringValue);
  } else {
    return stringValue;
  }
}

/**
 * Returns an object containing all configuration properties with snake-cased keys, read from
 * the env-defaults file, the .env file if there is one, and process.env
 *
 * @param envDefaultsPath - the path to the env-defaults file
 * @param dotEnvPath - path to the .env file
 * @returns all environment variables in snake case
 */
function loadEnvFromFiles(envDefaultsPath: string, dotEnvPath: string): Record<string, string> {
  let envOverrides: Record<string, string> = {};
  if (fs.existsSync(dotEnvPath)) {
    try {
      envOverrides = dotenv.parse(fs.readFileSync(dotEnvPath));
    } catch (e) {
      logger.warn(`Could not parse environment overrides from ${dotEnvPath}`);
      logger.warn(e instanceof Error ? e.message : `${e}`);
    }
  }
  const envDefaults = dotenv.parse(fs.readFileSync(envDefaultsPath));
  const processEnv = _.pickBy(process.env, (v): v is string => v !== undefined);
  return { ...envDefaults, ...envOverrides, ...processEnv };
}

/**
 * Get any errors from validating the environment - leave out the env object itself
 * from the output to avoid showing secrets.
 *
 * @param env - the StacApiEnv instance, including constraints
 * @returns An array of `ValidationError`s
 */
export function getValidationErrors(env: StacApiEnv): ValidationError[] {
  return validateSync(env, { validationError: { target: false } });
}

export class StacApiEnv {
  @IsInt()
  @Min(0)
  @Max(65535)
  port!: number;

  @IsNotEmpty()
  hostBinding!: string;

  @IsIn(logLevels)
  logLevel!: string;

  @IsBoolean()
  textLogger!: boolean;

  @IsNotEmpty()
  stacApiTitle!: string;

  @IsNotEmpty()
  stacApiDescription!: string;

  @IsNotEmpty()
  stacApiLandingId!: string;

  @Matches(/^\d+\.\d+\.\d+(-[\w.]+)?$/)
  stacVersion!: string;

  @IsBoolean()
  enableProxyHeaders!: boolean;

  @IsNotEmpty()
  corsOrigins!: string;

  @IsInt()
  @Min(1)
  defaultSearchLimit!: number;

  @IsInt()
  @Min(1)
  maxSearchLimit!: number;

  @Matches(memorySizeRegex)
  maxBodySize!: string;

  @Matches(/^\/\S*$/)
  openapiUrl!: string;

  @Matches(/^\/\S*$/)
  docsUrl!: string;

  /**
   * Validate the configuration.
   * @throws ConfigurationError on constraint violation
   */
  validate(): void {
    if (process.env.SKIP_ENV_VALIDATION === 'true') return;
    const errors = getValidationErrors(this);
    if (errors.length > 0) {
      for (const err of errors) {
        logger.error(err);
      }
      throw new ConfigurationError(`Invalid environment: ${listToText(errors.map((e) => e.property))}`);
    }
  }

  /**
   * Constructs the StacApiEnv instance.
   *
   * @param envDefaultsPath - path to the env-defaults file
   * @param dotEnvPath - path to the .env file
   */
  constructor(envDefaultsPath = path.resolve(__dirname, 'env-defaults'), dotEnvPath = '.env') {
    const env = loadEnvFromFiles(envDefaultsPath, dotEnvPath); // { CONFIG_NAME: '0', ... }
    const values: Record<string, ConfigValue> = {};
    for (const k of Object.keys(env)) {
      values[_.camelCase(k)] = makeConfigVar(env[k]); // { configName: 0, ... }
    }
    Object.assign(this, values);
  }
}

const envObj = new StacApiEnv();
envObj.validate();

export default envObj;
