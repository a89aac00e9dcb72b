import type { BBox, Geometry } from 'geojson';
import {
  arrayMaxSize, arrayMinSize, isDivisibleBy, isIn, isRFC3339, matches, max, maxLength, min,
  minLength,
} from 'class-validator';
import { Conjunction, listToText } from './string';
import type { FieldConstraints, FieldDescriptor, FieldType } from '../models/parameter-set';

/**
 * Tag class for denoting errors during parsing
 *
 */
export class ParameterParseError extends Error {}

/**
 * A parsed `datetime` parameter. A single instant has equal start and end; open ends are null.
 */
export interface DatetimeInterval {
  start: Date | null;
  end: Date | null;
}

const GEOMETRY_TYPES = [
  'Point', 'MultiPoint', 'LineString', 'MultiLineString', 'Polygon', 'MultiPolygon',
  'GeometryCollection',
];

/**
  * Helper function for parameters that parses and validates boolean values
  *
  * @param valueStr - the unparsed boolean as it appears in the input
  * @returns the parsed result
  * @throws ParameterParserError - if there are errors while parsing
  */
export function parseBoolean(valueStr: string): boolean {
  if (valueStr.toLowerCase() === 'true') return true;
  if (valueStr.toLowerCase() === 'false') return false;
  throw new ParameterParseError('must be \'false\' or \'true\'');
}

/**
 * Returns the parameter as parsed as an array of comma-separated values if
 * it was a string, or splits each element if it was repeated. Empty values are dropped.
 * @param value - The parameter value to parse (either an array or a string)
 */
export function parseMultiValueParameter(value: string[] | string): string[] {
  const values = value instanceof Array ? value : [value];
  return values
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

/**
 * Checks that a list of numbers is a 2D or 3D bounding box
 *
 * @param ords - the ordinates
 * @returns the bounding box
 * @throws ParameterParseError - if there are not 4 or 6 ordinates
 */
function _toBbox(ords: number[]): BBox {
  if (ords.length === 4) {
    return [ords[0], ords[1], ords[2], ords[3]];
  }
  if (ords.length === 6) {
    return [ords[0], ords[1], ords[2], ords[3], ords[4], ords[5]];
  }
  throw new ParameterParseError(`must have 4 or 6 numbers, got ${ords.length}`);
}

/**
 * Parses a `bbox` query parameter of 4 or 6 comma-separated numbers
 *
 * @param value - the parameter value
 * @returns the bounding box
 * @throws ParameterParseError - if the value is not a bounding box
 */
export function parseBbox(value: string | string[]): BBox {
  const parts = parseMultiValueParameter(value);
  const ords = parts.map((p) => Number(p));
  if (ords.some((o) => Number.isNaN(o))) {
    throw new ParameterParseError('must be a comma-separated list of numbers');
  }
  return _toBbox(ords);
}

/**
 * Parses one end of a datetime interval
 *
 * @param value - RFC 3339 date-time, or `..` or the empty string for an open end
 */
function _parseIntervalEnd(value: string): Date | null {
  if (value === '' || value === '..') return null;
  if (!isRFC3339(value)) {
    throw new ParameterParseError(`'${value}' is not an RFC 3339 date-time`);
  }
  return new Date(value);
}

/**
 * Parses a `datetime` parameter: a single RFC 3339 date-time or an interval `start/end`
 * where either end may be open (`..` or empty)
 *
 * @param value - the parameter value
 * @returns the interval
 * @throws ParameterParseError - if the value is not a valid instant or interval
 */
export function parseDatetime(value: string): DatetimeInterval {
  const parts = value.trim().split('/');
  if (parts.length === 1) {
    if (!isRFC3339(parts[0])) {
      throw new ParameterParseError(`'${value}' is not an RFC 3339 date-time or interval`);
    }
    const instant = new Date(parts[0]);
    return { start: instant, end: instant };
  }
  if (parts.length !== 2) {
    throw new ParameterParseError(`'${value}' is not an RFC 3339 date-time or interval`);
  }
  const start = _parseIntervalEnd(parts[0]);
  const end = _parseIntervalEnd(parts[1]);
  if (start === null && end === null) {
    throw new ParameterParseError('intervals must have at least one closed end');
  }
  if (start && end && start > end) {
    throw new ParameterParseError('interval start must not be after its end');
  }
  return { start, end };
}

/**
 * Returns true if the value looks like a GeoJSON geometry
 *
 * @param value - the value to check
 */
export function isGeometry(value: unknown): value is Geometry {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  const { type } = value;
  if (typeof type !== 'string' || !GEOMETRY_TYPES.includes(type)) return false;
  if (type === 'GeometryCollection') {
    return 'geometries' in value && Array.isArray(value.geometries)
      && value.geometries.every(isGeometry);
  }
  return 'coordinates' in value && Array.isArray(value.coordinates);
}

/**
 * Parses JSON text from a query parameter
 *
 * @param value - the parameter value
 * @throws ParameterParseError - if the value is not valid JSON
 */
export function parseJsonParameter(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (e) {
    throw new ParameterParseError('must be valid JSON');
  }
}

/**
 * Returns the last value of a possibly repeated query parameter
 *
 * @param raw - the parameter value
 */
function _single(raw: string | string[]): string {
  return Array.isArray(raw) ? raw[raw.length - 1] : raw;
}

/**
 * Converts a query string or path parameter to the type of its field
 *
 * @param type - the field type
 * @param raw - the value as it appears in the request
 * @returns the converted value
 * @throws ParameterParseError - if the value cannot be converted
 */
export function parseQueryValue(type: FieldType, raw: string | string[]): unknown {
  switch (type) {
    case 'string':
      return _single(raw);
    case 'integer': {
      const value = _single(raw).trim();
      if (!/^-?\d+$/.test(value)) throw new ParameterParseError('must be an integer');
      return parseInt(value, 10);
    }
    case 'number': {
      const value = _single(raw).trim();
      const parsed = Number(value);
      if (value === '' || !Number.isFinite(parsed)) throw new ParameterParseError('must be a number');
      return parsed;
    }
    case 'boolean':
      return parseBoolean(_single(raw));
    case 'string[]':
      return parseMultiValueParameter(raw);
    case 'bbox':
      return parseBbox(raw);
    case 'datetime':
      return parseDatetime(_single(raw));
    case 'json':
      return parseJsonParameter(_single(raw));
    case 'geometry': {
      const value = parseJsonParameter(_single(raw));
      if (!isGeometry(value)) throw new ParameterParseError('must be a GeoJSON geometry');
      return value;
    }
    default:
      throw new ParameterParseError(`has unsupported type ${type}`);
  }
}

/**
 * Checks a JSON body value against the type of its field
 *
 * @param type - the field type
 * @param raw - the value from the request body
 * @returns the value, converted where the JSON representation differs from the parsed one
 * @throws ParameterParseError - if the value has the wrong type
 */
export function parseBodyValue(type: FieldType, raw: unknown): unknown {
  switch (type) {
    case 'string':
      if (typeof raw !== 'string') throw new ParameterParseError('must be a string');
      return raw;
    case 'integer':
      if (!Number.isInteger(raw)) throw new ParameterParseError('must be an integer');
      return raw;
    case 'number':
      if (typeof raw !== 'number' || !Number.isFinite(raw)) throw new ParameterParseError('must be a number');
      return raw;
    case 'boolean':
      if (typeof raw !== 'boolean') throw new ParameterParseError('must be a boolean');
      return raw;
    case 'string[]':
      if (!Array.isArray(raw) || !raw.every((v) => typeof v === 'string')) {
        throw new ParameterParseError('must be an array of strings');
      }
      return raw;
    case 'bbox':
      if (!Array.isArray(raw) || !raw.every((v) => typeof v === 'number')) {
        throw new ParameterParseError('must be an array of numbers');
      }
      return _toBbox(raw);
    case 'datetime':
      if (typeof raw !== 'string') throw new ParameterParseError('must be a string');
      return parseDatetime(raw);
    case 'json':
      return raw;
    case 'geometry':
      if (!isGeometry(raw)) throw new ParameterParseError('must be a GeoJSON geometry');
      return raw;
    default:
      throw new ParameterParseError(`has unsupported type ${type}`);
  }
}

/**
 * Returns the constraint violations of a parsed value
 *
 * @param value - the parsed value
 * @param constraints - the constraints of its field
 * @returns a message per violated constraint
 */
export function checkConstraints(value: unknown, constraints: FieldConstraints = {}): string[] {
  const errors: string[] = [];
  const {
    gt, ge, lt, le, multipleOf, minLength: minLen, maxLength: maxLen, minItems, maxItems,
    pattern, enum: allowed,
  } = constraints;
  if (typeof value === 'number') {
    if (gt !== undefined && !(value > gt)) errors.push(`must be greater than ${gt}`);
    if (ge !== undefined && !min(value, ge)) errors.push(`must be greater than or equal to ${ge}`);
    if (lt !== undefined && !(value < lt)) errors.push(`must be less than ${lt}`);
    if (le !== undefined && !max(value, le)) errors.push(`must be less than or equal to ${le}`);
    if (multipleOf !== undefined && !isDivisibleBy(value, multipleOf)) {
      errors.push(`must be a multiple of ${multipleOf}`);
    }
  }
  if (typeof value === 'string') {
    if (minLen !== undefined && !minLength(value, minLen)) {
      errors.push(`must be at least ${minLen} characters long`);
    }
    if (maxLen !== undefined && !maxLength(value, maxLen)) {
      errors.push(`must be at most ${maxLen} characters long`);
    }
    if (pattern !== undefined && !matches(value, new RegExp(pattern))) {
      errors.push(`must match the pattern ${pattern}`);
    }
  }
  if (Array.isArray(value)) {
    if (minItems !== undefined && !arrayMinSize(value, minItems)) {
      errors.push(`must have at least ${minItems} items`);
    }
    if (maxItems !== undefined && !arrayMaxSize(value, maxItems)) {
      errors.push(`must have at most ${maxItems} items`);
    }
  }
  if (allowed !== undefined) {
    const values: unknown[] = Array.isArray(value) ? value : [value];
    if (!values.every((v) => isIn(v, allowed))) {
      errors.push(`must be ${listToText(allowed.map((a) => `'${a}'`), Conjunction.OR)}`);
    }
  }
  return errors;
}

/**
 * Returns the name of a field as it appears in requests
 *
 * @param field - the field
 */
export function wireName(field: FieldDescriptor): string {
  return field.alias ?? field.name;
}
