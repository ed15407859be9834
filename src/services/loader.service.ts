/**
 * Loader Service - Catalog and Candidate List Files
 *
 * Reads the two input files of a run and validates their shape.
 * `.yaml` / `.yml` files are parsed with the yaml package; everything else
 * is parsed as JSON.
 *
 * Every failure is raised as a LoadError naming the file, with reason:
 * - FILE_NOT_FOUND: the path does not exist
 * - READ_ERROR: the path exists but cannot be read
 * - PARSE_ERROR: the contents are not valid JSON / YAML
 * - INVALID_SHAPE: the contents do not match the expected structure; the
 *   first offending field is attached and all of them are logged
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import type { CandidateList, Catalog } from '../types/show.types';
import type { ParseResult } from '../types/validation.types';
import {
  errorMessage,
  isNodeError,
  LoadError,
  LoadErrorCode,
} from '../utils/error-handler';
import type { Logger } from '../utils/logger';
import {
  parseCandidates,
  parseCatalog,
} from '../validation/catalog.validation';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export class LoaderService {
  constructor(private readonly logger: Logger) {}

  /**
   * Reads and parses a data file without checking its shape.
   *
   * @throws {LoadError} FILE_NOT_FOUND, READ_ERROR or PARSE_ERROR
   */
  readDataFile(filePath: string): unknown {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      const notFound = isNodeError(error) && error.code === 'ENOENT';
      throw new LoadError(
        notFound
          ? `${filePath}: file not found`
          : `${filePath}: cannot read file: ${errorMessage(error)}`,
        filePath,
        notFound ? LoadErrorCode.FILE_NOT_FOUND : LoadErrorCode.READ_ERROR
      );
    }

    const format = YAML_EXTENSIONS.has(path.extname(filePath).toLowerCase())
      ? 'yaml'
      : 'json';

    try {
      const data: unknown =
        format === 'yaml' ? parseYaml(content) : JSON.parse(content);
      this.logger.trace('data file parsed', { path: filePath, format });
      return data;
    } catch (error) {
      throw new LoadError(
        `${filePath}: invalid ${format.toUpperCase()}: ${errorMessage(error)}`,
        filePath,
        LoadErrorCode.PARSE_ERROR
      );
    }
  }

  /**
   * @throws {LoadError} When the file is missing, unparseable or misshapen
   */
  loadCatalog(filePath: string): Catalog {
    const catalog = this.unwrap(
      filePath,
      parseCatalog(this.readDataFile(filePath))
    );
    this.logger.info(`loaded ${catalog.size} shows from ${filePath}`);
    return catalog;
  }

  /**
   * @throws {LoadError} When the file is missing, unparseable or misshapen
   */
  loadCandidates(filePath: string): CandidateList {
    const candidates = this.unwrap(
      filePath,
      parseCandidates(this.readDataFile(filePath))
    );
    this.logger.info(`loaded ${candidates.length} candidates from ${filePath}`);
    return candidates;
  }

  private unwrap<T>(filePath: string, result: ParseResult<T>): T {
    if (result.isValid) {
      return result.value;
    }

    for (const error of result.errors) {
      this.logger.debug(`${filePath}: ${error.message}`, {
        code: error.code,
        field: error.field,
      });
    }

    const [first] = result.errors;
    const more =
      result.errors.length > 1
        ? ` (and ${result.errors.length - 1} more)`
        : '';
    throw new LoadError(
      `${filePath}: ${first.message}${more}`,
      filePath,
      LoadErrorCode.INVALID_SHAPE,
      first.field
    );
  }
}
