export const SpeechVoices = [
  { id: "alloy", name: "Alloy" },
  { id: "echo", name: "Echo" },
  { id: "fable", name: "Fable" },
  { id: "onyx", name: "Onyx" },
  { id: "nova", name: "Nova" },
  { id: "shimmer", name: "Shimmer" },
] as const;

export type SpeechVoiceId = typeof SpeechVoices[number]["id"];

export const DEFAULT_SPEECH_VOICE: SpeechVoiceId = "alloy";

export function isSpeechVoice(voice: string): voice is SpeechVoiceId {
  return SpeechVoices.some((v) => v.id === voice);
}

/**
 * Returns the requested voice when it is in the catalogue, otherwise the fallback.
 */
export function resolveSpeechVoice(requested: string | undefined, fallback: SpeechVoiceId): SpeechVoiceId {
  if (requested && isSpeechVoice(requested)) {
    return requested;
  }
  if (requested) {
    console.warn(`[SpeechVoices] Invalid voice '${requested}' submitted, falling back to ${fallback}`);
  }
  return fallback;
}
