import { Injectable } from '@nestjs/common';

@Injectable()
export class TextNormalizerService {
  /**
   * Lowercase, replace anything outside [a-z0-9] and whitespace with a space,
   * then collapse whitespace runs.
   */
  normalize(text: string): string {
    return text
      .toLowerCase()
      .replace(/[^a-z0-9\s]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }
}
