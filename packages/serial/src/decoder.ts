/**
 * Byte-to-text decoding for the null-modem line.
 *
 * The emulated UART pads an idle line with 0xFF when running unthrottled;
 * those bytes are dropped before decoding. Line endings are folded to LF
 * and malformed UTF-8 becomes U+FFFD instead of failing the read.
 */

export const IDLE_FILLER_BYTE = 0xff;

export function stripFiller(data: Uint8Array): Uint8Array {
  if (!data.includes(IDLE_FILLER_BYTE)) return data;
  return data.filter((b) => b !== IDLE_FILLER_BYTE);
}

/**
 * Stateful decoder: a UTF-8 sequence split across two chunks decodes as one
 * character, and a CR that ends one chunk folds with an LF that starts the
 * next.
 */
export class SerialDecoder {
  private decoder = new TextDecoder('utf-8', { fatal: false });
  private pendingCR = false;

  /**
   * Push a raw chunk and return the normalized text it completes.
   * May return '' when the chunk was all filler or ends mid-character.
   */
  push(data: Uint8Array): string {
    const stripped = stripFiller(data);
    if (stripped.length === 0) return '';
    return this.normalize(this.decoder.decode(stripped, { stream: true }));
  }

  /**
   * Flush a trailing partial character (as U+FFFD) once the line is closed.
   */
  flush(): string {
    return this.normalize(this.decoder.decode());
  }

  /**
   * Reset decoder state (e.g., on connection reset).
   */
  reset(): void {
    this.decoder = new TextDecoder('utf-8', { fatal: false });
    this.pendingCR = false;
  }

  private normalize(decoded: string): string {
    let text = decoded;
    if (text.length === 0) return '';

    if (this.pendingCR && text.startsWith('\n')) {
      text = text.slice(1);
    }
    this.pendingCR = false;
    if (text.length === 0) return '';

    this.pendingCR = text.endsWith('\r');
    return text.replace(/\r\n?/g, '\n');
  }
}
