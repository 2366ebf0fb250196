import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { platform } from 'os';
import { dirname } from 'path';

function chromeCandidates(os: NodeJS.Platform, env: NodeJS.ProcessEnv): string[] {
  if (os === 'darwin') {
    const bundles = ['Google Chrome.app/Contents/MacOS/Google Chrome', 'Chromium.app/Contents/MacOS/Chromium'];
    const roots = ['/Applications', ...(env.HOME ? [`${env.HOME}/Applications`] : [])];
    return roots.flatMap((root) => bundles.map((bundle) => `${root}/${bundle}`));
  }

  if (os === 'win32') {
    const roots = [env.PROGRAMFILES, env['PROGRAMFILES(X86)'], env.LOCALAPPDATA].filter(
      (root): root is string => Boolean(root),
    );
    return roots.flatMap((root) => [
      `${root}\\Google\\Chrome\\Application\\chrome.exe`,
      `${root}\\Chromium\\Application\\chrome.exe`,
    ]);
  }

  return ['google-chrome', 'google-chrome-stable', 'chromium', 'chromium-browser']
    .flatMap((name) => [`/usr/bin/${name}`, `/usr/local/bin/${name}`])
    .concat('/snap/bin/chromium', '/opt/google/chrome/chrome');
}

export interface ChromeLookup {
  /** QUOTE_SCRAPER_CHROME_PATH; when set, no other location is tried. */
  configuredPath?: string;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  exists?: (path: string) => boolean;
}

/** Chrome executable to launch, or undefined when none is installed where we look. */
export function findChrome(lookup: ChromeLookup = {}): string | undefined {
  const exists = lookup.exists ?? existsSync;
  if (lookup.configuredPath) {
    return exists(lookup.configuredPath) ? lookup.configuredPath : undefined;
  }
  return chromeCandidates(lookup.platform ?? platform(), lookup.env ?? process.env).find((p) => exists(p));
}

/**
 * Scale a PNG down so that neither side exceeds `maxDimension`. Smaller
 * images are returned untouched.
 */
export async function fitScreenshot(raw: Buffer, maxDimension: number): Promise<Buffer> {
  const sharp = (await import('sharp')).default;
  const { width, height } = await sharp(raw).metadata();

  if (width && height && (width > maxDimension || height > maxDimension)) {
    return sharp(raw)
      .resize(maxDimension, maxDimension, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .png()
      .toBuffer();
  }

  return raw;
}

/**
 * Write a PNG to `path`, creating its directory and resizing if necessary.
 * Returns the path written.
 */
export async function saveScreenshot(
  raw: Buffer,
  path: string,
  maxDimension: number,
): Promise<string> {
  const finalBuffer = await fitScreenshot(raw, maxDimension);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, finalBuffer);
  return path;
}
