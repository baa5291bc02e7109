import fs from 'fs-extra';
import { fileURLToPath } from 'url';

const DATA_DIR = new URL('../../data/', import.meta.url);

/** Read a JSON file shipped in the package's `data/` directory. */
export function readPackageData(fileName: string): unknown {
    return fs.readJsonSync(fileURLToPath(new URL(fileName, DATA_DIR)));
}
