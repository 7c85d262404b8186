import abbreviationTables from '../config/abbreviations.json';
import { ResourceUnavailableError } from '../lib/errors';

interface AbbreviationTable {
  /** Abbreviations that never end a sentence (`Dr.`, `etc.`). */
  always: readonly string[];
  /** Abbreviations that look like ordinary words, so only count before a number (`No. 5`, `Sat. 12`). */
  beforeNumber: readonly string[];
}

interface AbbreviationRules {
  always: RegExp;
  beforeNumber: RegExp | null;
}

const ABBREVIATIONS: Record<string, AbbreviationTable> = abbreviationTables;

type TokenKind = 'word' | 'whitespace' | 'terminal' | 'ellipsis' | 'quote';

interface Token {
  value: string;
  kind: TokenKind;
}

const TOKEN_REGEX =
  /(…|\.\.\.)|([.!?])|(["'“”‘’«»(){}\[\]])|(\s+)|([^\s.!?…"'“”‘’«»(){}\[\]]+)/g;

// Compiled once per language; the tables never change at run time.
const rulesCache = new Map<string, AbbreviationRules>();

function baseLanguage(language: string): string {
  return language.trim().toLowerCase().split(/[-_]/)[0];
}

export function supportedLanguages(): string[] {
  return Object.keys(ABBREVIATIONS);
}

const escapeAbbreviation = (abbr: string): string => abbr.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Matches when the text ends with one of the words followed by its period.
function trailingWordPattern(words: readonly string[]): string {
  return `(?:^|[\\s"'“‘«(\\[{])(?:${words.map(escapeAbbreviation).join('|')})\\.`;
}

function abbreviationRules(language: string): AbbreviationRules {
  const key = baseLanguage(language);
  const cached = rulesCache.get(key);
  if (cached) {
    return cached;
  }
  if (!Object.hasOwn(ABBREVIATIONS, key)) {
    throw new ResourceUnavailableError(
      `No sentence tokenizer resources for language '${language}' (available: ${supportedLanguages().join(', ')})`
    );
  }

  const table = ABBREVIATIONS[key];
  const rules: AbbreviationRules = {
    always: new RegExp(
      `(?:${trailingWordPattern(table.always)}|\\b(?:[A-Za-z]\\.){2,}|\\b[A-Za-z]\\.)$`,
      'iu'
    ),
    beforeNumber: table.beforeNumber.length ? new RegExp(`${trailingWordPattern(table.beforeNumber)}$`, 'iu') : null,
  };
  rulesCache.set(key, rules);
  return rules;
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let match: RegExpExecArray | null;

  TOKEN_REGEX.lastIndex = 0;
  while ((match = TOKEN_REGEX.exec(text))) {
    const [value, ellipsis, terminal, quote, whitespace] = match;
    if (ellipsis) {
      tokens.push({ value, kind: 'ellipsis' });
    } else if (terminal) {
      tokens.push({ value, kind: 'terminal' });
    } else if (quote) {
      tokens.push({ value, kind: 'quote' });
    } else if (whitespace) {
      tokens.push({ value, kind: 'whitespace' });
    } else {
      tokens.push({ value, kind: 'word' });
    }
  }

  return tokens;
}

function isTerminalCandidate(token: Token): boolean {
  return token.kind === 'terminal' || token.kind === 'ellipsis';
}

// Closing quotes, brackets and stacked punctuation ("?!", '."') stay with the sentence.
function shouldAttachToSentence(token: Token): boolean {
  return token.kind === 'quote' || isTerminalCandidate(token);
}

const startsWithDigit = (token: Token | undefined): boolean =>
  token?.kind === 'word' && /^\p{Nd}/u.test(token.value);

function isAbbreviation(rules: AbbreviationRules, upToTerminal: string, following: Token | undefined): boolean {
  if (rules.always.test(upToTerminal)) {
    return true;
  }
  return Boolean(rules.beforeNumber?.test(upToTerminal)) && startsWithDigit(following);
}

function startsSentence(token: Token | undefined): boolean {
  if (!token) {
    return true;
  }
  if (token.kind === 'word') {
    return !/^\p{Ll}/u.test(token.value);
  }
  return true;
}

/**
 * Splits text into sentences. Whitespace runs are collapsed first, so joining the
 * result with single spaces gives back the normalised input.
 */
export function splitIntoSentences(text: string, language = 'en'): string[] {
  const rules = abbreviationRules(language);
  const normalized = normalizeWhitespace(text);
  if (!normalized) {
    return [];
  }

  const tokens = tokenize(normalized);
  const sentences: string[] = [];
  let current = '';
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];
    current += token.value;

    if (isTerminalCandidate(token)) {
      const upToTerminal = current;
      while (i + 1 < tokens.length && shouldAttachToSentence(tokens[i + 1])) {
        i += 1;
        current += tokens[i].value;
      }

      const next = tokens[i + 1];
      const atBoundary =
        (!next || next.kind === 'whitespace') &&
        !(token.value === '.' && isAbbreviation(rules, upToTerminal, tokens[i + 2])) &&
        startsSentence(tokens[i + 2]);

      if (atBoundary) {
        const sentence = current.trim();
        if (sentence) {
          sentences.push(sentence);
        }
        current = '';
      }
    }

    i += 1;
  }

  const remainder = current.trim();
  if (remainder) {
    sentences.push(remainder);
  }

  return sentences;
}
