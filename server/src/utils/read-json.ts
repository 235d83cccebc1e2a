import fs from 'fs';

/**
 * Read a JSON file relative to a module URL (pass `import.meta.url`).
 */
export function readJsonFile(relativePath: string, base: string | URL): unknown {
    return JSON.parse(fs.readFileSync(new URL(relativePath, base), 'utf8'));
}
