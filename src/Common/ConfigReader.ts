/**
 * Reads structured files (library configuration, profile catalogs) from disk.
 * This is a generic reader; validation is the caller's concern.
 */
import { readFile } from 'fs/promises';
import { NotFoundError, ValidationError } from './Errors.js';

/**
 * Loads and parses a JSON or YAML file.
 * @param configPath string - Path to the file (e.g. './config/config.yaml')
 * @returns Promise<unknown> - Parsed content, not yet validated
 * @throws NotFoundError if the file does not exist, ValidationError if the format is unsupported or the content does not parse
 * @example
 * const raw = await readConfigFile('./config/config.json');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    let raw: string;

    try {
        raw = await readFile(configPath, 'utf-8');
    } catch (err) {
        if (err instanceof Error && `code` in err && err.code === `ENOENT`) {
            throw new NotFoundError(`File not found: ${configPath}`, { path: configPath });
        }
        throw err;
    }

    if (configPath.endsWith('.json')) {
        try {
            return JSON.parse(raw);
        } catch (err) {
            throw new ValidationError(`Malformed JSON in '${configPath}'`, { path: configPath }, err);
        }
    }

    if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
        // Lazy-load yaml parser only if needed
        const yaml = await import('js-yaml');

        try {
            return yaml.load(raw);
        } catch (err) {
            throw new ValidationError(`Malformed YAML in '${configPath}'`, { path: configPath }, err);
        }
    }
    throw new ValidationError(`Unsupported file format for '${configPath}'. Use .json or .yaml`, { path: configPath });
}
