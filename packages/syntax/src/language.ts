import { ok } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure } from './errors';
import type { FormatError } from './errors';

/** A BCP-47 language tag broken into its subtags. */
export interface LanguageTag {
  /** Canonical casing of the whole tag, e.g. `zh-Hant-TW`. */
  readonly tag: string;
  /** Primary language subtag; empty for private-use-only tags. */
  readonly language: string;
  readonly extlang: readonly string[];
  readonly script?: string;
  readonly region?: string;
  readonly variants: readonly string[];
  readonly extensions: readonly { readonly singleton: string; readonly subtags: readonly string[] }[];
  readonly privateUse: readonly string[];
}

// Irregular grandfathered tags keep their own structure.
const IRREGULAR = new Set([
  'en-gb-oed',
  'i-ami',
  'i-bnn',
  'i-default',
  'i-enochian',
  'i-hak',
  'i-klingon',
  'i-lux',
  'i-mingo',
  'i-navajo',
  'i-pwn',
  'i-tao',
  'i-tay',
  'i-tsu',
  'sgn-be-fr',
  'sgn-be-nl',
  'sgn-ch-de',
]);

const titlecase = (s: string): string => s.charAt(0).toUpperCase() + s.slice(1);

/** Case a subtag by its shape: regions upper, scripts title, the rest lower. */
function caseSubtag(subtag: string, index: number): string {
  if (index > 0 && subtag.length === 2) {
    return subtag.toUpperCase();
  }
  if (index > 0 && subtag.length === 4 && /^[a-z]+$/.test(subtag)) {
    return titlecase(subtag);
  }
  return subtag;
}

function privateUseOnly(parts: string[]): Result<LanguageTag, FormatError> {
  const subtags = parts.slice(1);
  if (subtags.length === 0 || !subtags.every((s) => /^[a-z0-9]{1,8}$/.test(s))) {
    return formatFailure('language', 'InvalidSubtag', 'private-use tags need 1-8 character subtags after "x"');
  }
  return ok({
    tag: parts.join('-'),
    language: '',
    extlang: [],
    variants: [],
    extensions: [],
    privateUse: subtags,
  });
}

/**
 * Parse a BCP-47 language tag and normalize its casing.
 *
 * The primary language must be a 2-3 letter code, so `english` is
 * rejected even though it is well-formed as a reserved 5-8 letter subtag.
 *
 * @example
 * ```typescript
 * parseLanguage('zh-hant-tw'); // tag: 'zh-Hant-TW'
 * parseLanguage('english');    // rule: 'InvalidPrimaryLanguage'
 * ```
 */
export function parseLanguage(raw: string): Result<LanguageTag, FormatError> {
  if (raw.length === 0) {
    return formatFailure('language', 'Empty', 'language tag must not be empty');
  }

  const parts = raw.toLowerCase().split('-');
  for (const part of parts) {
    if (!/^[a-z0-9]{1,8}$/.test(part)) {
      return formatFailure('language', 'InvalidSubtag', `"${part}" is not a 1-8 character alphanumeric subtag`);
    }
  }

  if (IRREGULAR.has(parts.join('-'))) {
    return ok({
      tag: parts.map(caseSubtag).join('-'),
      language: parts[0],
      extlang: [],
      variants: [],
      extensions: [],
      privateUse: [],
    });
  }

  if (parts[0] === 'x') {
    return privateUseOnly(parts);
  }

  const language = parts[0];
  if (!/^[a-z]{2,3}$/.test(language)) {
    return formatFailure('language', 'InvalidPrimaryLanguage', `"${raw.split('-')[0]}" is not a 2-3 letter language code`);
  }

  let i = 1;
  const extlang: string[] = [];
  while (i < parts.length && extlang.length < 3 && /^[a-z]{3}$/.test(parts[i])) {
    extlang.push(parts[i++]);
  }

  let script: string | undefined;
  if (i < parts.length && /^[a-z]{4}$/.test(parts[i])) {
    script = titlecase(parts[i++]);
  }

  let region: string | undefined;
  if (i < parts.length && /^([a-z]{2}|[0-9]{3})$/.test(parts[i])) {
    region = parts[i++].toUpperCase();
  }

  const variants: string[] = [];
  while (i < parts.length && /^([a-z0-9]{5,8}|[0-9][a-z0-9]{3})$/.test(parts[i])) {
    if (variants.includes(parts[i])) {
      return formatFailure('language', 'DuplicateSubtag', `variant "${parts[i]}" appears twice`);
    }
    variants.push(parts[i++]);
  }

  const extensions: { singleton: string; subtags: string[] }[] = [];
  while (i < parts.length && /^[0-9a-wyz]$/.test(parts[i])) {
    const singleton = parts[i++];
    if (extensions.some((e) => e.singleton === singleton)) {
      return formatFailure('language', 'DuplicateSubtag', `extension "${singleton}" appears twice`);
    }
    const subtags: string[] = [];
    while (i < parts.length && /^[a-z0-9]{2,8}$/.test(parts[i])) {
      subtags.push(parts[i++]);
    }
    if (subtags.length === 0) {
      return formatFailure('language', 'InvalidSubtag', `extension "${singleton}" has no subtags`);
    }
    extensions.push({ singleton, subtags });
  }

  const privateUse: string[] = [];
  if (i < parts.length && parts[i] === 'x') {
    i++;
    while (i < parts.length) {
      privateUse.push(parts[i++]);
    }
    if (privateUse.length === 0) {
      return formatFailure('language', 'InvalidSubtag', 'private-use section has no subtags');
    }
  }

  if (i < parts.length) {
    return formatFailure('language', 'InvalidSubtag', `unexpected subtag "${parts[i]}"`);
  }

  const tag = [
    language,
    ...extlang,
    ...(script ? [script] : []),
    ...(region ? [region] : []),
    ...variants,
    ...extensions.flatMap((e) => [e.singleton, ...e.subtags]),
    ...(privateUse.length > 0 ? ['x', ...privateUse] : []),
  ].join('-');

  return ok({ tag, language, extlang, script, region, variants, extensions, privateUse });
}

/** Validate a language tag and return its canonical casing. */
export function validateLanguage(raw: string): Result<string, FormatError> {
  const parsed = parseLanguage(raw);
  return parsed.ok ? ok(parsed.value.tag) : parsed;
}

/** Whether `raw` is a valid language tag. */
export function isValidLanguage(raw: string): boolean {
  return parseLanguage(raw).ok;
}
