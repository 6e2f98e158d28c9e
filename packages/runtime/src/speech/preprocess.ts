import { GatewayError, SPEECH_DEFAULTS } from '@glimpse/core';

const URL_PATTERN = /https?:\/\/[^\s<>()[\]`"']+/g;
const CODE_PATTERN = /```[\s\S]*?```|`[^`]+`/g;

function stripMarkdown(text: string): string {
  return text
    .replace(/^#+\s+/gm, '')
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .replace(/__([^_]+)__/g, '$1')
    .replace(/_([^_]+)_/g, '$1')
    .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1');
}

/** Turns model output into text a speech engine can read aloud. */
export function prepareSpeechText(text: string, maxLength: number = SPEECH_DEFAULTS.MAX_TEXT_LENGTH): string {
  const prepared = stripMarkdown(
    text
      .slice(0, maxLength)
      .replace(URL_PATTERN, 'link')
      .replace(CODE_PATTERN, 'code block')
  )
    .replace(/\s+/g, ' ')
    .trim();

  if (prepared.length === 0) {
    throw new GatewayError('SpeechGenerationFailed', 'Nothing left to speak after preprocessing the text');
  }
  return prepared;
}

export function clampSpeed(speed: number | undefined): number {
  if (speed === undefined || !Number.isFinite(speed)) {
    return SPEECH_DEFAULTS.SPEED;
  }
  return Math.min(SPEECH_DEFAULTS.MAX_SPEED, Math.max(SPEECH_DEFAULTS.MIN_SPEED, speed));
}
