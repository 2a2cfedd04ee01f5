// voice-cleaner.ts - Text normalization for TTS.

// Pre-compiled regex patterns
const RE_CODE_BLOCKS = /```[\s\S]*?```/g;
const RE_INLINE_CODE = /`([^`]+)`/g;
const RE_BOLD_ITALIC_STAR = /\*{1,3}([^*]+)\*{1,3}/g;
const RE_BOLD_ITALIC_UNDER = /\b_{1,3}([^_]+)_{1,3}\b/g;
const RE_HEADERS = /^#{1,6}\s+/gm;
const RE_LINKS = /\[([^\]]+)\]\([^)]*\)/g;
const RE_IMAGES = /!\[[^\]]*\]\([^)]*\)/g;
const RE_BULLETS = /^\s*[-*+]\s+/gm;
const RE_NUMBERED = /^\s*\d+\.\s+/gm;
const RE_BLOCKQUOTES = /^\s*>\s?/gm;
const RE_HORIZ_RULES = /^[-*_]{3,}\s*$/gm;
const RE_URLS = /https?:\/\/\S+/g;
const RE_SPACES = /[ \t]+/g;
const RE_NEWLINES = /\n{2,}/g;

/**
 * Normalize text for TTS output.
 * Strips markdown and URLs, collapses whitespace.
 */
export function normalizeVoiceText(text: string): string {
  text = text.replace(RE_CODE_BLOCKS, "");
  text = text.replace(RE_INLINE_CODE, "$1");
  text = text.replace(RE_BOLD_ITALIC_STAR, "$1");
  text = text.replace(RE_BOLD_ITALIC_UNDER, "$1");
  text = text.replace(RE_HEADERS, "");
  text = text.replace(RE_IMAGES, ""); // Must run before LINKS
  text = text.replace(RE_LINKS, "$1");
  text = text.replace(RE_BULLETS, "");
  text = text.replace(RE_NUMBERED, "");
  text = text.replace(RE_BLOCKQUOTES, "");
  text = text.replace(RE_HORIZ_RULES, "");
  text = text.replace(RE_URLS, "");

  text = text.replace(/—/g, ", ");
  text = text.replace(/–/g, ", ");

  text = text.replace(RE_SPACES, " ");
  text = text.replace(RE_NEWLINES, "\n");
  return text.trim();
}
