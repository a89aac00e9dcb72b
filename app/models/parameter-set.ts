/**
 * Where the fields of a request model are read from: the query string and path of a GET
 * request, or the JSON body of a POST request
 */
export enum RequestKind {
  QUERY = 'query',
  BODY = 'body',
}

export type HttpMethod = 'GET' | 'POST';

export type FieldType =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'string[]'
  | 'bbox'
  | 'datetime'
  | 'json'
  | 'geometry';

export interface FieldConstraints {
  gt?: number;
  ge?: number;
  lt?: number;
  le?: number;
  multipleOf?: number;
  minLength?: number;
  maxLength?: number;
  minItems?: number;
  maxItems?: number;
  pattern?: string;
  enum?: Array<string | number>;
}

/**
 * Describes one field of a request
 */
export interface FieldDescriptor {
  // property name in the parsed request
  name: string;
  type: FieldType;
  // name of the field on the wire, when it differs from `name`
  alias?: string;
  // 0 makes the field name win over the alias when a request carries both
  aliasPriority?: number;
  title?: string;
  description?: string;
  default?: unknown;
  defaultFactory?: () => unknown;
  required?: boolean;
  // query kind only
  in?: 'query' | 'path';
  constraints?: FieldConstraints;
  extra?: Record<string, unknown>;
}

/**
 * A named list of request fields of one kind, contributed by the core API or by an extension
 */
export interface ParameterSet {
  name: string;
  kind: RequestKind;
  fields: FieldDescriptor[];
}

/**
 * Creates a parameter set read from the query string (and path) of a request
 *
 * @param name - the name of the set
 * @param fields - the fields
 */
export function queryParameters(name: string, fields: FieldDescriptor[]): ParameterSet {
  return { name, kind: RequestKind.QUERY, fields };
}

/**
 * Creates a parameter set read from the JSON body of a request
 *
 * @param name - the name of the set
 * @param fields - the fields; path locations are dropped
 */
export function bodyParameters(name: string, fields: FieldDescriptor[]): ParameterSet {
  return { name, kind: RequestKind.BODY, fields: fields.map(toBodyField) };
}

/**
 * Re-derives a field as a body field, keeping everything but its query string location
 *
 * @param field - the field
 * @returns a copy of the field for use in a JSON body
 */
export function toBodyField(field: FieldDescriptor): FieldDescriptor {
  const { in: _location, ...bodyField } = field;
  return { ...bodyField };
}
