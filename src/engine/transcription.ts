import { EngineError } from './engine_error.js';

/**
 * Placeholder speech-to-text: picks a canned question by clip size until a
 * real recognizer is wired in.
 */
export function transcribeAudio(audio: Uint8Array): string {
  if (audio.length === 0) {
    throw new EngineError('invalid_query', 'Audio payload is empty');
  }
  if (audio.length <= 1000) return 'Is Bitcoin halal?';
  if (audio.length <= 5000) return 'What is the Islamic ruling on Ethereum?';
  return 'Please analyze this cryptocurrency from Sharia perspective';
}
