const CHARACTERS_PER_SECOND = 15;

/** Rough spoken length used when the vendor does not report one. */
export function estimateSpeechSeconds(text: string, speed: number): number {
    const seconds = text.length / CHARACTERS_PER_SECOND / speed;
    return Math.round(seconds * 10) / 10;
}

/** `en-US-JennyNeural` → `en-US`. */
export function languageOfVoice(voice: string, fallback: string): string {
    const match = /^([a-z]{2,3}-[A-Z]{2})-/.exec(voice);
    return match?.[1] ?? fallback;
}

export function isDefaultVoice(voice: string | undefined): boolean {
    return !voice || voice === 'default';
}
