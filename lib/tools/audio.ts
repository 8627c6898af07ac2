/**
 * Audio Tool - Audio format helpers
 */

export type AudioFormat = 'mp3' | 'wav' | 'opus' | 'aac' | 'flac';

const CONTENT_TYPES: Record<AudioFormat, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  opus: 'audio/ogg',
  aac: 'audio/aac',
  flac: 'audio/flac',
};

/** Stands in for empty slide text so every slide still gets audio. */
export const SILENT_TEXT = '...';

export class AudioTool {
  static contentType(format: AudioFormat): string {
    return CONTENT_TYPES[format];
  }

  /**
   * Estimate duration from buffer size at a constant bitrate.
   * 128kbps ≈ 16KB/sec
   */
  static estimateDuration(audioBuffer: Buffer, bitrateKbps = 128): number {
    const bytesPerSecond = (bitrateKbps * 1000) / 8;
    return Math.ceil(audioBuffer.length / bytesPerSecond);
  }

  static speakableText(text: string): string {
    return text.trim() || SILENT_TEXT;
  }
}
