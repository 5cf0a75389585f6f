import type { PipelineStage } from './types';

interface Token {
  lead: string;
  core: string;
  trail: string;
}

const TOKEN_PATTERN = /^([^\p{L}\p{N}]*)(.*?)([^\p{L}\p{N}]*)$/u;

const splitToken = (raw: string): Token => {
  const match = raw.match(TOKEN_PATTERN);
  return {
    lead: match?.[1] ?? '',
    core: match?.[2] ?? raw,
    trail: match?.[3] ?? '',
  };
};

const joinToken = (token: Token) => `${token.lead}${token.core}${token.trail}`;

const CLOSING_MARKS: Record<string, string> = {
  '(': ')',
  '[': ']',
  '{': '}',
  '"': '"',
  "'": "'",
  '\u201c': '\u201d',
  '\u2018': '\u2019',
  '\u00ab': '\u00bb',
};

const STANDALONE_PUNCTUATION = /^[,;:.!?\u2026]+$/u;

const isStandalonePunctuation = (token: Token | undefined) =>
  token !== undefined && !token.core && STANDALONE_PUNCTUATION.test(token.lead);

/** Drops bracket and quote pairs that wrap nothing but the removed filler. */
const stripWrappingPairs = (lead: string, trail: string) => {
  let open = lead;
  let close = trail;
  while (open) {
    const closing = CLOSING_MARKS[open.slice(-1)];
    const at = closing === undefined ? -1 : close.indexOf(closing);
    if (at < 0) break;
    open = open.slice(0, -1);
    close = `${close.slice(0, at)}${close.slice(at + 1)}`;
  }
  return { open, close };
};

const mapLines = (input: string, fn: (line: string) => string) => {
  if (!input.includes('\n') && !input.includes('\r')) {
    return fn(input);
  }
  return input
    .split(/\r?\n/)
    .map((line) => fn(line))
    .join('\n')
    .trim();
};

const toFillerSequences = (fillers: readonly string[]) =>
  fillers
    .map((filler) => filler.toLowerCase().split(/\s+/).filter(Boolean))
    .filter((words) => words.length > 0)
    .sort((a, b) => b.length - a.length);

const matchFiller = (tokens: Token[], index: number, sequences: string[][]) =>
  sequences.find((words) =>
    words.every((word, offset) => {
      const token = tokens[index + offset];
      if (!token || token.core.toLowerCase() !== word) return false;
      if (offset > 0 && token.lead) return false;
      if (offset < words.length - 1 && token.trail) return false;
      return true;
    })
  );

const removeFillersOnce = (line: string, sequences: string[][]) => {
  const tokens = line.split(/\s+/).filter(Boolean).map(splitToken);
  const output: Token[] = [];
  let pendingLead = '';
  let index = 0;

  while (index < tokens.length) {
    const words = matchFiller(tokens, index, sequences);
    if (!words) {
      const token = tokens[index];
      output.push(pendingLead ? { ...token, lead: `${pendingLead}${token.lead}` } : token);
      pendingLead = '';
      index += 1;
      continue;
    }
    const first = tokens[index];
    let end = index + words.length;
    let trail = tokens[end - 1].trail;
    // Punctuation typed as its own word after the filler goes with it.
    while (isStandalonePunctuation(tokens[end])) {
      trail += tokens[end].lead;
      end += 1;
    }
    const { open, close } = stripWrappingPairs(first.lead, trail);
    pendingLead += open;
    // A comma belongs to the filler; a sentence ending or unpaired closing mark stays.
    const kept = close.replace(/[,;:]/g, '');
    const previous = output[output.length - 1];
    if (kept && previous) {
      previous.trail = `${previous.trail.replace(/[,;:]+$/, '')}${kept}`;
    }
    index = end;
  }

  return output.map(joinToken).join(' ');
};

const removeFillers = (line: string, fillers: readonly string[]) => {
  const sequences = toFillerSequences(fillers);
  if (!sequences.length) return line;
  let current = line;
  // Removing one filler can bring a multi-word filler together.
  for (;;) {
    const next = removeFillersOnce(current, sequences);
    if (next === current) return next;
    current = next;
  }
};

const capitalizeFirstLetter = (input: string) =>
  input.replace(/\p{L}/u, (letter) => letter.toUpperCase());

const capitalizeSentenceStarts = (input: string) =>
  input.replace(
    /([.!?]+["')\]]*\s+[^\p{L}\s]*)(\p{Ll})/gu,
    (_match, prefix: string, letter: string) => `${prefix}${letter.toUpperCase()}`
  );

export const whitespaceNormalizationStage: PipelineStage = {
  id: 'whitespace-normalization',
  enabled: () => true,
  run: (input) => mapLines(input, (line) => line.replace(/\s+/g, ' ').trim()).trim(),
};

export const fillerRemovalStage: PipelineStage = {
  id: 'filler-removal',
  enabled: (context) => context.removeFillerWords && context.fillerWords.length > 0,
  run: (input, context) => mapLines(input, (line) => removeFillers(line, context.fillerWords)),
};

export const capitalizationStage: PipelineStage = {
  id: 'capitalization',
  enabled: (context) => context.autoCapitalize,
  run: (input, context) => {
    const capitalized = capitalizeFirstLetter(input);
    return context.capitalizeSentences ? capitalizeSentenceStarts(capitalized) : capitalized;
  },
};

export const punctuationStage: PipelineStage = {
  id: 'punctuation',
  enabled: (context) => context.autoPunctuate,
  run: (input) => {
    const normalized = mapLines(input, (line) =>
      line
        .replace(/\s+([,.;!?])/g, '$1')
        .replace(/\.{3,}/g, '...')
        .replace(/[ \t]{2,}/g, ' ')
        .trim()
    );
    if (/[\p{L}\p{N}]$/u.test(normalized)) {
      return `${normalized}.`;
    }
    return normalized;
  },
};
