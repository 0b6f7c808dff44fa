const repeatingWhitespace = /\s+/g;
const punctuation = /[^\p{L}\p{N}\s]/gu;
const yo = /ё/g;

// NFKC keeps й composed and turns NBSP into a plain space; ё compares equal to е.
export const normalizeDescription = (input: string): string =>
  input
    .normalize('NFKC')
    .toLowerCase()
    .replace(yo, 'е')
    .replace(punctuation, ' ')
    .replace(repeatingWhitespace, ' ')
    .trim();
