/**
 * Template loading from disk
 *
 * Ad templates come from one directory, sorted by file name so that the
 * detection priority is stable. The two volume icons are single files
 * that may be absent.
 */

import * as fs from 'fs';
import * as path from 'path';

import sharp from 'sharp';

import { toGray } from '@core/template-match';
import { decodePng } from '@hardware/screen';
import type { Logger } from '@logging';
import { StartupError, TemplateLoadError } from '$types/errors';
import type { GrayImage, Template } from '$types';

import type { TemplateLoaderConfig, TemplateSet } from './types';

/**
 * Decode image bytes by file extension: pngjs for PNG, sharp for JPEG
 */
async function decodeImage(bytes: Buffer, file: string, grayscale: boolean): Promise<GrayImage> {
  if (path.extname(file).toLowerCase() === '.png') {
    return decodePng(bytes, grayscale);
  }
  const { data, info } = await sharp(bytes).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return toGray({ width: info.width, height: info.height, data: data }, grayscale);
}

/**
 * Read and decode one PNG or JPEG template
 * @throws {TemplateLoadError} When the file cannot be read or decoded
 */
export async function loadTemplateFile(file: string, grayscale: boolean): Promise<Template> {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(file);
  } catch (err) {
    throw new TemplateLoadError("Cannot read " + file + ": " + String(err), file);
  }

  try {
    return {
      name: path.basename(file),
      path: file,
      image: await decodeImage(bytes, file, grayscale)
    };
  } catch (err) {
    throw new TemplateLoadError("Cannot decode " + file + ": " + String(err), file);
  }
}

/**
 * Load every image in the ads directory
 *
 * @throws {StartupError} When the directory does not exist
 */
export async function loadAdTemplates(dir: string, config: TemplateLoaderConfig, logger: Logger): Promise<TemplateSet> {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new StartupError("Ad template directory not found: " + dir);
  }

  const names = fs.readdirSync(dir).filter(function(name) {
    return config.IMAGE_EXTENSIONS.indexOf(path.extname(name).toLowerCase()) !== -1;
  }).sort();

  const templates: Template[] = [];
  const skipped: string[] = [];

  for (const name of names) {
    try {
      templates.push(await loadTemplateFile(path.join(dir, name), config.MATCH_GRAYSCALE));
    } catch (err) {
      if (!(err instanceof TemplateLoadError)) {
        throw err;
      }
      logger.warning("Skipping " + name + ": " + err.message);
      skipped.push(name);
    }
  }

  if (templates.length === 0) {
    logger.warning("No ad templates loaded from " + dir + "; ads will not be detected");
  } else {
    logger.info("Loaded " + templates.length + " ad template(s) from " + dir);
  }

  return { templates: templates, skipped: skipped };
}

/**
 * Load a volume icon; a missing or unreadable file yields null
 * @param file - Icon path, '' when not configured
 * @param label - Name used in log lines ("muted icon")
 */
export async function loadOptionalTemplate(
  file: string,
  grayscale: boolean,
  label: string,
  logger: Logger
): Promise<Template | null> {
  if (file === '') {
    logger.warning("No " + label + " configured; on-screen mute state reads as unknown");
    return null;
  }
  if (!fs.existsSync(file)) {
    logger.warning("The " + label + " is missing at " + file + "; on-screen mute state reads as unknown");
    return null;
  }
  try {
    return await loadTemplateFile(file, grayscale);
  } catch (err) {
    if (!(err instanceof TemplateLoadError)) {
      throw err;
    }
    logger.warning("The " + label + " could not be loaded: " + err.message);
    return null;
  }
}
