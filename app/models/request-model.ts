import _ from 'lodash';
import logger from '../util/log';
import { ConfigurationError, RequestValidationError } from '../util/errors';
import {
  ParameterParseError, checkConstraints, parseBodyValue, parseQueryValue, wireName,
} from '../util/parameter-parsing';
import {
  FieldDescriptor, HttpMethod, ParameterSet, RequestKind, toBodyField,
} from './parameter-set';
import {
  baseSearchGetParameters, baseSearchPostParameters, SearchGetRequest, SearchPostRequest,
} from './search';

/**
 * Anything contributing request fields per HTTP method, e.g. an API extension
 */
export interface RequestModelSource {
  getRequestModel(httpMethod: HttpMethod): ParameterSet | null;
}

/**
 * How to treat a field declared differently by two parameter sets of one model
 */
export type ConflictPolicy = 'error' | 'override';

/**
 * The raw parts of a request a model reads its fields from
 */
export interface RequestInput {
  query?: Record<string, unknown>;
  params?: Record<string, string>;
  body?: unknown;
}

/**
 * Narrows a query string value to the shapes the query parser produces
 *
 * @param value - the value from the parsed query string
 */
function _queryValue(value: unknown): string | string[] | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return undefined;
}

/**
 * Returns true if the value is a plain JSON object
 *
 * @param value - the value to check
 */
function _isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A request type bound to a route, composed from the parameter sets of the core API and its
 * extensions. Immutable once built.
 */
export default class RequestModel<T = Record<string, unknown>> implements ParameterSet {
  readonly name: string;

  readonly kind: RequestKind;

  readonly fields: FieldDescriptor[];

  readonly parent: ParameterSet | null;

  /**
   * @param name - the model name, e.g. `SearchPostRequest`
   * @param kind - whether fields come from the query string or the body
   * @param fields - the fields of the model
   * @param parent - the parameter set the model was derived from, if any
   */
  constructor(name: string, kind: RequestKind, fields: FieldDescriptor[], parent: ParameterSet | null = null) {
    this.name = name;
    this.kind = kind;
    this.fields = fields;
    this.parent = parent;
    Object.freeze(this.fields);
  }

  /**
   * Returns the field with the given property name
   *
   * @param name - the property name of the field
   */
  field(name: string): FieldDescriptor | undefined {
    return this.fields.find((f) => f.name === name);
  }

  /**
   * Returns the value for a field from the request along with the name it was found under
   *
   * @param field - the field to look up
   * @param source - the query string, path parameters or body
   */
  private _lookup(field: FieldDescriptor, source: Record<string, unknown>): [string, unknown] | null {
    const names = field.aliasPriority === 0
      ? [field.name, field.alias]
      : [field.alias, field.name];
    for (const name of _.uniq(names)) {
      if (name !== undefined && source[name] !== undefined && source[name] !== null) {
        return [name, source[name]];
      }
    }
    return null;
  }

  /**
   * Parses a request into the typed request object, applying aliases, defaults, type
   * conversions and constraints
   *
   * @param input - the query string, path parameters and body of the request
   * @returns the parsed request
   * @throws RequestValidationError - listing every invalid or missing field
   */
  parse(input: RequestInput): T {
    const errors: string[] = [];
    const result: Record<string, unknown> = {};
    let body: Record<string, unknown> = {};
    if (this.kind === RequestKind.BODY && input.body !== undefined) {
      if (!_isJsonObject(input.body)) {
        throw new RequestValidationError('The request body must be a JSON object');
      }
      body = input.body;
    }

    for (const field of this.fields) {
      let source: Record<string, unknown> = body;
      if (this.kind === RequestKind.QUERY) {
        source = (field.in === 'path' ? input.params : input.query) ?? {};
      }
      const found = this._lookup(field, source);
      if (!found) {
        if (field.defaultFactory) {
          result[field.name] = field.defaultFactory();
        } else if (field.default !== undefined) {
          result[field.name] = _.cloneDeep(field.default);
        } else if (field.required) {
          errors.push(`"${wireName(field)}" is required`);
        }
        continue;
      }

      const [key, raw] = found;
      let value: unknown;
      try {
        if (this.kind === RequestKind.QUERY) {
          const queryValue = _queryValue(raw);
          if (queryValue === undefined) throw new ParameterParseError('must be a string');
          value = parseQueryValue(field.type, queryValue);
        } else {
          value = parseBodyValue(field.type, raw);
        }
      } catch (e) {
        if (!(e instanceof ParameterParseError)) throw e;
        errors.push(`"${key}" ${e.message}`);
        continue;
      }
      const violations = checkConstraints(value, field.constraints);
      errors.push(...violations.map((v) => `"${key}" ${v}`));
      result[field.name] = value;
    }

    if (errors.length > 0) {
      throw new RequestValidationError(`Invalid ${this.name}: ${errors.join('; ')}`);
    }
    // every field has been converted and checked against its descriptor above
    return result as T;
  }
}

/**
 * Merges the fields of parameter sets in order. A field declared again with an identical
 * descriptor is kept once.
 *
 * @param modelName - name of the model being built, for messages
 * @param sets - the parameter sets in precedence order
 * @param onConflict - `error` throws on a field declared differently; `override` lets the
 *   later declaration win
 * @returns the merged fields
 * @throws ConfigurationError - on a conflicting field when `onConflict` is `error`
 */
export function mergeFields(
  modelName: string, sets: ParameterSet[], onConflict: ConflictPolicy = 'error',
): FieldDescriptor[] {
  const fields: FieldDescriptor[] = [];
  const declaredBy = new Map<string, string>();
  for (const set of sets) {
    for (const field of set.fields) {
      const index = fields.findIndex((f) => f.name === field.name);
      if (index === -1) {
        fields.push(field);
        declaredBy.set(field.name, set.name);
      } else if (!_.isEqual(fields[index], field)) {
        const message = `Field "${field.name}" of ${modelName} is declared differently by ${declaredBy.get(field.name)} and ${set.name}`;
        if (onConflict !== 'override') {
          throw new ConfigurationError(message);
        }
        logger.warn(`${message}; using the declaration from ${set.name}`);
        fields[index] = field;
        declaredBy.set(field.name, set.name);
      }
    }
  }
  return fields;
}

/**
 * Composes the request model for one HTTP method and logical operation from a base parameter
 * set, the sets the extensions contribute for the method, and any mixins.
 *
 * Query kind models take the union of the declared fields. Body kind models re-derive every
 * field as a body field and keep the base set as their parent.
 *
 * @param modelName - the name of the composed model
 * @param base - the base parameter set
 * @param extensions - the extensions, in precedence order
 * @param mixins - additional parameter sets, merged last
 * @param httpMethod - selects the parameter set each extension contributes
 * @param onConflict - what to do with fields declared differently by two sets
 * @returns the composed model
 * @throws ConfigurationError - if the sets mix query and body kinds
 */
export function composeRequestModel<T = Record<string, unknown>>(
  modelName: string,
  base: ParameterSet,
  extensions: RequestModelSource[] = [],
  mixins: ParameterSet[] = [],
  httpMethod: HttpMethod = 'GET',
  onConflict: ConflictPolicy = 'error',
): RequestModel<T> {
  const extensionSets = extensions
    .map((ext) => ext.getRequestModel(httpMethod))
    .filter((set): set is ParameterSet => set !== null);
  const sets = [base, ...extensionSets, ...mixins];

  if (sets.every((s) => s.kind === RequestKind.QUERY)) {
    return new RequestModel<T>(modelName, RequestKind.QUERY, mergeFields(modelName, sets, onConflict));
  }
  if (sets.every((s) => s.kind === RequestKind.BODY)) {
    const bodySets = sets.map((s) => ({ ...s, fields: s.fields.map(toBodyField) }));
    const fields = mergeFields(modelName, bodySets, onConflict);
    return new RequestModel<T>(modelName, RequestKind.BODY, fields, base);
  }
  const kinds = sets.map((s) => `${s.name} (${s.kind})`).join(', ');
  throw new ConfigurationError(`Mixed request model kinds for ${modelName}: ${kinds}. Check extension request models.`);
}

/**
 * Composes the `SearchGetRequest` model
 *
 * @param extensions - the enabled extensions
 * @param base - the base parameter set
 */
export function createGetRequestModel(
  extensions: RequestModelSource[], base: ParameterSet = baseSearchGetParameters,
): RequestModel<SearchGetRequest> {
  return composeRequestModel<SearchGetRequest>('SearchGetRequest', base, extensions, [], 'GET');
}

/**
 * Composes the `SearchPostRequest` model
 *
 * @param extensions - the enabled extensions
 * @param base - the base parameter set
 */
export function createPostRequestModel(
  extensions: RequestModelSource[], base: ParameterSet = baseSearchPostParameters,
): RequestModel<SearchPostRequest> {
  return composeRequestModel<SearchPostRequest>('SearchPostRequest', base, extensions, [], 'POST');
}

export type EmptyRequest = Record<string, never>;

// for routes that take no parameters
export const emptyRequestModel = new RequestModel<EmptyRequest>('EmptyRequest', RequestKind.QUERY, []);
