/**
 * Screen capture and template lookup
 */

import { createInlineSearch, hitCenter } from '@core/template-match';
import type { TemplateSearch } from '@core/template-match';
import type { ScreenMatcher } from '@core/detector';
import type { PowerShellRunner } from '@hardware/powershell';
import type { MatchResult, Template } from '$types';

import { decodePng, parseCapturePayload } from './helpers';
import type { ScreenFrame, ScreenMatcherConfig } from './types';

/**
 * Capture the whole virtual desktop
 * @throws {PowerShellError} When the script fails or returns bad output
 * @throws {Error} When the PNG cannot be decoded
 */
export async function captureScreen(runner: PowerShellRunner, grayscale: boolean): Promise<ScreenFrame> {
  const payload = parseCapturePayload(await runner.run('capture-screen.ps1', []));
  return {
    originX: payload.left,
    originY: payload.top,
    image: decodePng(Buffer.from(payload.png, 'base64'), grayscale)
  };
}

export interface DesktopMatcher extends ScreenMatcher {
  /** Frame the last refresh captured, if any */
  currentFrame(): ScreenFrame | null;
}

/**
 * Matcher that searches the most recent desktop capture
 * @param search - Where lookups run; the calling thread unless given
 */
export function createScreenMatcher(
  runner: PowerShellRunner,
  config: ScreenMatcherConfig,
  search: TemplateSearch = createInlineSearch()
): DesktopMatcher {
  let frame: ScreenFrame | null = null;

  async function refresh(): Promise<void> {
    frame = null;
    frame = await captureScreen(runner, config.MATCH_GRAYSCALE);
  }

  async function locate(template: Template): Promise<MatchResult> {
    const current = frame;
    if (current === null) {
      throw new Error("No screen frame captured");
    }
    const hit = await search.find(current.image, template.image, config.MATCH_CONFIDENCE);
    if (hit === null) {
      return null;
    }
    return hitCenter(hit, template.image, current.originX, current.originY);
  }

  return {
    refresh: refresh,
    locate: locate,
    currentFrame: function() { return frame; }
  };
}
