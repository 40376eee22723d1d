import fs from 'fs';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors.js';
import { validator } from './validators.js';

/**
 * Read a JSON file from the repository's data/ directory.
 *
 * Resolved relative to this module so the same path works from src/ (tests,
 * tsx) and from dist/ after a build.
 */
export function readDataFile(fileName: string): unknown {
  const filePath = fileURLToPath(new URL(`../../data/${fileName}`, import.meta.url));

  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to load data file ${fileName}: ${error instanceof Error ? error.message : String(error)}`, {
      filePath,
    });
  }
}

/**
 * Read a data file and check it against a JSON schema before use.
 */
export function readValidatedDataFile<T>(
  fileName: string,
  schema: object,
  isShape: (value: unknown) => value is T
): T {
  const data = readDataFile(fileName);
  const schemaId = `data:${fileName}`;
  validator.compileSchema(schemaId, schema);

  const result = validator.validate(schemaId, data);
  if (!result.valid || !isShape(data)) {
    throw new ConfigurationError(
      `Data file ${fileName} does not match its schema:\n${validator.formatErrors(result.errors)}`
    );
  }

  return data;
}
