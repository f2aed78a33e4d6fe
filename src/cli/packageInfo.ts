import * as fs from 'fs';
import * as path from 'path';

export interface PackageInfo {
    name: string;
    version: string;
}

// Two levels up from both src/cli and dist/cli.
const PACKAGE_JSON = path.resolve(__dirname, '..', '..', 'package.json');

export function readPackageInfo(file = PACKAGE_JSON): PackageInfo {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null) {
        throw new Error(`${file} is not a package manifest`);
    }
    const name = 'name' in parsed && typeof parsed.name === 'string' ? parsed.name : 'compdb-edit';
    const version = 'version' in parsed && typeof parsed.version === 'string' ? parsed.version : '0.0.0';
    return { name, version };
}
