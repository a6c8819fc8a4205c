import { createRequire } from 'node:module';

// 版本號以 package.json 為準
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../../package.json');

export const PACKAGE_VERSION = pkg.version;
