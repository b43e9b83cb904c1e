/**
 * Small text helpers shared by the channel diagnostics and the serial log.
 */

/** Last `count` characters of `text`. */
export function tail(text: string, count: number): string {
  if (count <= 0) return '';
  return text.length > count ? text.slice(text.length - count) : text;
}

/** Space separated lowercase hex, e.g. `ff 0d 0a`. */
export function hexBytes(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, '0')).join(' ');
}

/**
 * True if the chunk holds anything other than printable ASCII,
 * tab, line feed or carriage return.
 */
export function hasNonPrintable(data: Uint8Array): boolean {
  for (const b of data) {
    if (b > 0x7e) return true;
    if (b < 0x20 && b !== 0x09 && b !== 0x0a && b !== 0x0d) return true;
  }
  return false;
}

/** Split text into lines, keeping each line's trailing `\n`. */
export function splitLinesKeepEnds(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lines.push(text.slice(start, i + 1));
      start = i + 1;
    }
  }
  if (start < text.length) {
    lines.push(text.slice(start));
  }
  return lines;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
