import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { ConfigurationError } from '@efaktur/shared';

const require = createRequire(import.meta.url);

/**
 * Trained data installed from npm, by language code
 */
export const BUNDLED_LANGUAGE_PACKAGES: Readonly<Record<string, string>> = {
  eng: '@tesseract.js-data/eng',
  ind: '@tesseract.js-data/ind',
};

/** Model variant read from each package */
export const BUNDLED_MODEL_DIRECTORY = '4.0.0_best_int';

export interface LanguageData {
  code: string;
  data: Uint8Array;
}

/**
 * Throw unless every language has an installed data package.
 */
export function assertBundledLanguages(languages: readonly string[]): void {
  const missing = languages.filter((code) => BUNDLED_LANGUAGE_PACKAGES[code] === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `No installed OCR data for ${missing.join(', ')}; set OCR_LANG_PATH to a directory holding it`,
      { missing },
    );
  }
}

/**
 * Path of the gzipped `.traineddata` file for `code`
 */
export function bundledLanguageFile(code: string): string {
  const packageName = BUNDLED_LANGUAGE_PACKAGES[code];
  if (packageName === undefined) {
    throw new ConfigurationError(`No installed OCR data for ${code}`, { missing: [code] });
  }
  const packageDirectory = dirname(require.resolve(`${packageName}/package.json`));
  return join(packageDirectory, BUNDLED_MODEL_DIRECTORY, `${code}.traineddata.gz`);
}

/**
 * Read the installed trained data. tesseract.js unpacks gzip itself.
 */
export async function loadBundledLanguages(languages: readonly string[]): Promise<LanguageData[]> {
  assertBundledLanguages(languages);
  return Promise.all(
    languages.map(async (code) => ({ code, data: await readFile(bundledLanguageFile(code)) })),
  );
}
