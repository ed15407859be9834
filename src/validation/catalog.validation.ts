/**
 * Shape validation for catalog and candidate list files.
 *
 * Catalog file: an object keyed by decimal show identifier.
 * ```json
 * {
 *   "1": {
 *     "mal_id": 1,
 *     "title": "Cowboy Bebop",
 *     "url": "https://example.org/anime/1",
 *     "opening_themes": ["Tank!"],
 *     "ending_themes": ["The Real Folk Blues"],
 *     "soundtrack": []
 *   }
 * }
 * ```
 *
 * Rules:
 * - `id` may be spelled `mal_id`, `other_soundtrack` may be spelled `soundtrack`
 * - Theme lists default to empty when absent
 * - `url` may be absent or null
 * - Unknown fields are ignored
 *
 * Candidate list file: an array of unsigned integers.
 */

import type { CandidateList, Show, ShowId } from '../types/show.types';
import {
  describeType,
  invalid,
  valid,
  ValidationErrorCode,
  type ParseResult,
  type ValidationError,
} from '../types/validation.types';

const DECIMAL_KEY = /^\d+$/;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUnsignedInteger(value: unknown): value is number {
  return (
    typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
  );
}

/**
 * Reads a field that may appear under either of two names.
 */
function readAliased(
  record: JsonObject,
  name: string,
  alias: string,
  field: string,
  errors: ValidationError[]
): unknown {
  const hasName = Object.prototype.hasOwnProperty.call(record, name);
  const hasAlias = Object.prototype.hasOwnProperty.call(record, alias);
  if (hasName && hasAlias) {
    errors.push({
      code: ValidationErrorCode.INVALID_VALUE,
      message: `${field} sets both "${name}" and "${alias}"`,
      field: `${field}.${name}`,
      details: { expected: `only one of "${name}" or "${alias}"` },
    });
  }
  return hasName ? record[name] : record[alias];
}

function parseThemeList(
  value: unknown,
  field: string,
  errors: ValidationError[]
): string[] {
  if (value === undefined) return [];

  if (!Array.isArray(value)) {
    errors.push({
      code: ValidationErrorCode.INVALID_TYPE,
      message: `${field} must be an array of strings`,
      field,
      details: { expected: 'array of strings', received: describeType(value) },
    });
    return [];
  }

  const themes: string[] = [];
  value.forEach((theme: unknown, index) => {
    if (typeof theme === 'string') {
      themes.push(theme);
    } else {
      errors.push({
        code: ValidationErrorCode.INVALID_TYPE,
        message: `${field}[${index}] must be a string`,
        field: `${field}[${index}]`,
        details: { expected: 'string', received: describeType(theme) },
      });
    }
  });
  return themes;
}

/**
 * Validates a single show record and builds the Show.
 *
 * @param value - Parsed JSON value of one catalog entry
 * @param field - Path used in error messages, e.g. `catalog["7"]`
 */
export function parseShow(value: unknown, field: string): ParseResult<Show> {
  if (!isObject(value)) {
    return invalid({
      code: ValidationErrorCode.INVALID_TYPE,
      message: `${field} must be an object`,
      field,
      details: { expected: 'object', received: describeType(value) },
    });
  }

  const errors: ValidationError[] = [];

  const id = readAliased(value, 'id', 'mal_id', field, errors);
  if (id === undefined) {
    errors.push({
      code: ValidationErrorCode.MISSING_PARAMETER,
      message: `${field}.id is required`,
      field: `${field}.id`,
      details: { expected: 'unsigned integer under "id" or "mal_id"' },
    });
  } else if (!isUnsignedInteger(id)) {
    errors.push({
      code: ValidationErrorCode.INVALID_TYPE,
      message: `${field}.id must be an unsigned integer`,
      field: `${field}.id`,
      details: { expected: 'unsigned integer', received: id },
    });
  }

  const title = value.title;
  if (typeof title !== 'string') {
    errors.push({
      code:
        title === undefined
          ? ValidationErrorCode.MISSING_PARAMETER
          : ValidationErrorCode.INVALID_TYPE,
      message: `${field}.title must be a string`,
      field: `${field}.title`,
      details: { expected: 'string', received: describeType(title) },
    });
  }

  const url = value.url;
  if (url !== undefined && url !== null && typeof url !== 'string') {
    errors.push({
      code: ValidationErrorCode.INVALID_TYPE,
      message: `${field}.url must be a string`,
      field: `${field}.url`,
      details: { expected: 'string or null', received: describeType(url) },
    });
  }

  const openingThemes = parseThemeList(
    value.opening_themes,
    `${field}.opening_themes`,
    errors
  );
  const endingThemes = parseThemeList(
    value.ending_themes,
    `${field}.ending_themes`,
    errors
  );
  const otherSoundtrack = parseThemeList(
    readAliased(value, 'other_soundtrack', 'soundtrack', field, errors),
    `${field}.other_soundtrack`,
    errors
  );

  if (
    errors.length > 0 ||
    !isUnsignedInteger(id) ||
    typeof title !== 'string'
  ) {
    return invalid(...errors);
  }

  const show: Show = { id, title, openingThemes, endingThemes, otherSoundtrack };
  if (typeof url === 'string') {
    show.url = url;
  }
  return valid(show);
}

/**
 * Validates a parsed catalog file and builds the identifier → show map.
 * Collects errors from every entry rather than stopping at the first.
 */
export function parseCatalog(value: unknown): ParseResult<Map<ShowId, Show>> {
  if (!isObject(value)) {
    return invalid({
      code: ValidationErrorCode.INVALID_TYPE,
      message: 'catalog must be an object keyed by show id',
      field: 'catalog',
      details: {
        expected: 'object with decimal keys',
        received: describeType(value),
      },
    });
  }

  const catalog = new Map<ShowId, Show>();
  const errors: ValidationError[] = [];

  for (const [key, entry] of Object.entries(value)) {
    const field = `catalog[${JSON.stringify(key)}]`;
    const id = Number(key);

    if (!DECIMAL_KEY.test(key) || !Number.isSafeInteger(id)) {
      errors.push({
        code: ValidationErrorCode.INVALID_VALUE,
        message: `${field} key must be an unsigned integer`,
        field,
        details: { expected: 'decimal digits', received: key },
      });
      continue;
    }

    const result = parseShow(entry, field);
    if (result.isValid) {
      catalog.set(id, result.value);
    } else {
      errors.push(...result.errors);
    }
  }

  return errors.length > 0 ? invalid(...errors) : valid(catalog);
}

/**
 * Validates a parsed candidate list file.
 */
export function parseCandidates(value: unknown): ParseResult<CandidateList> {
  if (!Array.isArray(value)) {
    return invalid({
      code: ValidationErrorCode.INVALID_TYPE,
      message: 'list must be an array of show ids',
      field: 'list',
      details: { expected: 'array', received: describeType(value) },
    });
  }

  const ids: ShowId[] = [];
  const errors: ValidationError[] = [];

  value.forEach((id: unknown, index) => {
    if (isUnsignedInteger(id)) {
      ids.push(id);
    } else {
      errors.push({
        code: ValidationErrorCode.INVALID_TYPE,
        message: `list[${index}] must be an unsigned integer`,
        field: `list[${index}]`,
        details: { expected: 'unsigned integer', received: id },
      });
    }
  });

  return errors.length > 0 ? invalid(...errors) : valid(ids);
}
