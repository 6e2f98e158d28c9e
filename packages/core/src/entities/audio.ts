export const AUDIO_FORMATS = ['mp3', 'wav', 'ogg'] as const;

export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export const AUDIO_CONTENT_TYPES: Record<AudioFormat, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  ogg: 'audio/ogg'
};

export interface AudioMetadata {
  voice: string;
  speed: number;
  sourceTextLength: number;
}

export interface AudioAsset {
  id: string;
  /** Caller-resolvable URL of the payload. */
  locator: string;
  filename: string;
  format: AudioFormat;
  durationSeconds: number;
  sizeBytes: number;
  createdAt: Date;
  metadata: AudioMetadata;
}

export function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.some((format) => format === value);
}
