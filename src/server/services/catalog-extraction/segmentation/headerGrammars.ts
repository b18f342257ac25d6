/**
 * Header grammars
 *
 * One grammar per source format. Patterns for the scanned and current eras
 * are fixed; changing them changes which lines open a course block.
 */

import type { HeaderMatch, IHeaderGrammar } from '../interfaces/IHeaderGrammar.js';

/** `1.125 Architecting Software Systems`: title starts upper-case or digit */
export const SCANNED_ERA_HEADER_RE = /^\s*(\d{1,2}\.\d{3})\s+([A-Z0-9].*?)\s*$/;

/** `6.100A Title`, `21H.001 Title`, `CMS.100 Title` */
export const CURRENT_ERA_HEADER_RE = /^\s*([0-9A-Z]{1,4}(?:\.[0-9A-Z]{1,4})+)\s+(.+?)\s*$/;

/** `CS 2500. Title. (4 Hours)`, `ARCH1110 Title 4 SH` */
export const CREDIT_HOUR_HEADER_RE = /^\s*([A-Z]{2,6})\s*-?\s*(\d{3,5}[A-Z]?)\b[.\s-]*(.+?)\s*$/;

const PARENTHESIZED_CREDITS_RE = /\(([^()]*\d[^()]*)\)\s*$/;
const TRAILING_CREDITS_RE = /\b(\d+(?:\.\d+)?(?:\s*[-–]\s*\d+(?:\.\d+)?)?\s*(?:SH|Hours?|Hrs|Credits?))\.?\s*$/i;

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

/**
 * Split a trailing credits token off a header title.
 * `"Title. (4 Hours)"` gives `{ title: "Title.", credits: "4 Hours" }`.
 */
export function splitTrailingCredits(titleLine: string): { title: string; credits?: string } {
  const t = collapse(titleLine);

  const parenthesized = PARENTHESIZED_CREDITS_RE.exec(t);
  if (parenthesized) {
    return { title: collapse(t.slice(0, parenthesized.index)), credits: collapse(parenthesized[1]) };
  }

  const bare = TRAILING_CREDITS_RE.exec(t);
  if (bare) {
    return { title: collapse(t.slice(0, bare.index)), credits: collapse(bare[1]) };
  }

  return { title: t };
}

function regexGrammar(name: string, pattern: RegExp): IHeaderGrammar {
  return {
    name,
    match(line: string): HeaderMatch | null {
      const m = pattern.exec(line);
      if (!m) {
        return null;
      }
      return { identifier: m[1], titleFragment: m[2] };
    },
  };
}

export const scannedEraGrammar: IHeaderGrammar = regexGrammar('scanned-era', SCANNED_ERA_HEADER_RE);

export const currentEraGrammar: IHeaderGrammar = regexGrammar('current-era', CURRENT_ERA_HEADER_RE);

export const creditHourGrammar: IHeaderGrammar = {
  name: 'credit-hour',
  match(line: string): HeaderMatch | null {
    const m = CREDIT_HOUR_HEADER_RE.exec(line);
    if (!m) {
      return null;
    }
    const { title, credits } = splitTrailingCredits(m[3]);
    return {
      identifier: `${m[1]} ${m[2]}`,
      titleFragment: title,
      ...(credits !== undefined && { creditsFragment: credits }),
    };
  },
};
