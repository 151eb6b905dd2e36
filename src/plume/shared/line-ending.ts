import type { LineEnding } from "../core/types";

export function detectLineEnding(text: string): LineEnding {
  return text.includes("\r\n") ? "crlf" : "lf";
}

export function normalizeLineEndings(text: string): string {
  return text.includes("\r\n") ? text.replace(/\r\n/g, "\n") : text;
}

export function restoreLineEndings(text: string, ending: LineEnding): string {
  return ending === "crlf" ? text.replace(/\n/g, "\r\n") : text;
}

export function lineEndingLabel(ending: LineEnding): "LF" | "CRLF" {
  return ending === "crlf" ? "CRLF" : "LF";
}
