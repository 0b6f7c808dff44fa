import { BankSchema } from '../entities/BankSchema.js';
import { RawRecord } from '../entities/Statement.js';

export const COUNTERPARTY_COLUMN_ALIASES = [
  'counterparty_name',
  'counterparty',
  'Контрагент',
  'Контрагент (имя)',
  'Наименование получателя',
  'Наименование получателя (бенеф)',
  'Наименование получателя (отправителя денег)',
  'Корреспондент',
  'Получатель',
  'Отправитель',
  'Жіберуші/Отправитель',
] as const;

export const DESCRIPTION_COLUMN_ALIASES = [
  'description',
  'details',
  'Детали платежа',
  'Назначение платежа',
  'Описание операции',
  'operation',
] as const;

// BIN / IIN: twelve digits not embedded in a longer number
const businessIdentifier = /(?<!\d)(\d{12})(?!\d)/;
const trailingPunctuation = /[\s,;:№#(\-]+$/;
const trailingLabel = /(?:^|[\s(])(?:БИН|ИИН|BIN|IIN)$/i;

export interface ResolvedCounterparty {
  counterpartyId: string;
  counterpartyName: string;
}

export const cellText = (fields: RawRecord, column: string | undefined): string => {
  if (!column) {
    return '';
  }
  const value = fields[column];
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).trim();
};

export const firstLine = (text: string): string => text.split(/\r?\n/)[0].trim();

export const stripBankPrefix = (text: string, prefixes: readonly string[]): string => {
  const lowered = text.toLowerCase();
  const prefix = prefixes.find((candidate) => lowered.startsWith(candidate.toLowerCase()));
  return prefix ? text.slice(prefix.length).trim() : text;
};

export const counterpartyCandidates = (schema: BankSchema | undefined): string[] => {
  const ordered = [
    schema?.columns.counterparty,
    ...COUNTERPARTY_COLUMN_ALIASES,
    schema?.columns.purpose,
    ...DESCRIPTION_COLUMN_ALIASES,
  ].filter((column): column is string => Boolean(column));

  return [...new Set(ordered)];
};

export const extractCounterparty = (text: string): ResolvedCounterparty => {
  const match = businessIdentifier.exec(text);

  if (match) {
    const identifier = match[1];
    const before = firstLine(text.slice(0, match.index))
      .replace(trailingPunctuation, '')
      .replace(trailingLabel, '')
      .replace(trailingPunctuation, '')
      .trim();
    const after = firstLine(text.slice(match.index + identifier.length).replace(/^[\s,;:)\-]+/, ''));

    return {
      counterpartyId: identifier,
      counterpartyName: before || after || identifier,
    };
  }

  const line = firstLine(text);
  return { counterpartyId: line, counterpartyName: line };
};

/**
 * Picks the first non-empty candidate column, strips the bank's fixed description prefixes,
 * then pulls out a BIN/IIN when one is embedded in the text.
 */
export const resolveCounterparty = (
  fields: RawRecord,
  schema: BankSchema | undefined,
  description: string,
): ResolvedCounterparty => {
  const prefixes = schema?.descriptionPrefixes ?? [];

  for (const column of counterpartyCandidates(schema)) {
    const text = cellText(fields, column);
    if (!text) {
      continue;
    }

    const stripped = stripBankPrefix(text, prefixes);
    if (stripped) {
      return extractCounterparty(stripped);
    }
  }

  return {
    counterpartyId: description,
    counterpartyName: description,
  };
};
