/**
 * Input Parsers
 *
 * Reads the chemical library CSV and the similarity-search text report into
 * typed records. Bad records are collected as MalformedInputError and
 * skipped; only a file that cannot be read as a whole throws.
 */

import { MalformedInputError } from './errors';
import { chemicalRowSchema } from './validations/records';
import type { CandidateList, CandidateTarget, Chemical } from './screening-types';

export interface ParseResult<T> {
  records: T[];
  issues: MalformedInputError[];
}

interface CsvRecord {
  /** 1-based line the record starts on */
  line: number;
  fields: string[];
}

/** Split CSV text into records, honouring quoted fields and doubled quotes. */
export function parseCsv(text: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = () => {
    fields.push(field);
    // Blank lines carry no record
    if (fields.length > 1 || fields[0].trim() !== '') {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    field = '';
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += ch;
    }
  }

  if (field !== '' || fields.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse the chemical library CSV (Name, SMILES, optional Plant and Category).
 * Throws MalformedInputError when a required column is missing.
 */
export function parseChemicalCsv(text: string): ParseResult<Chemical> {
  const [header, ...rows] = parseCsv(text.replace(/^\uFEFF/, ''));
  if (!header) {
    throw new MalformedInputError('Chemical library is empty', { stage: 'search' });
  }

  const columns = header.fields.map((name) => name.trim());
  const missing = ['Name', 'SMILES'].filter((name) => !columns.includes(name));
  if (missing.length > 0) {
    throw new MalformedInputError(`Chemical library is missing column(s): ${missing.join(', ')}`, {
      stage: 'search',
      line: header.line,
    });
  }

  const column = (fields: string[], name: string): string | undefined => {
    const index = columns.indexOf(name);
    return index >= 0 ? fields[index] : undefined;
  };

  const records: Chemical[] = [];
  const issues: MalformedInputError[] = [];
  const seen = new Set<string>();

  const reject = (message: string, line: number, identifier?: string) => {
    const issue = new MalformedInputError(message, { stage: 'search', line, identifier });
    console.warn(`[Input] Line ${line}: ${message}`);
    issues.push(issue);
  };

  for (const row of rows) {
    const parsed = chemicalRowSchema.safeParse({
      Name: column(row.fields, 'Name') ?? '',
      SMILES: column(row.fields, 'SMILES') ?? '',
      Plant: column(row.fields, 'Plant'),
      Category: column(row.fields, 'Category'),
    });

    if (!parsed.success) {
      reject(parsed.error.issues.map((issue) => issue.message).join('; '), row.line);
      continue;
    }

    const { Name, SMILES, Plant, Category } = parsed.data;
    if (seen.has(Name)) {
      reject(`Duplicate chemical "${Name}"`, row.line, Name);
      continue;
    }
    seen.add(Name);

    const metadata: NonNullable<Chemical['metadata']> = {};
    if (Plant) metadata.source = Plant;
    if (Category) metadata.category = Category;

    records.push({
      id: Name,
      structure: SMILES,
      ...(Object.keys(metadata).length > 0 ? { metadata } : {}),
    });
  }

  console.log(`[Input] Loaded ${records.length} chemicals (${issues.length} rows rejected)`);
  return { records, issues };
}

const MOLECULE_PREFIX = 'MOLECULE:';
const TARGET_ID_PATTERN = /^[A-Za-z0-9]{4}$/;

/**
 * Parse a similarity-search text report into per-chemical candidate lists.
 *
 * A `MOLECULE: <name>` line opens a block. Inside a block, lines whose first
 * token is a rank are hit rows: `<rank> <targetId> <score> [organism...]`.
 * Other lines (rules, headings, per-molecule statistics) are ignored.
 */
export function parseSimilarityReport(text: string): ParseResult<CandidateList> {
  const lists = new Map<string, CandidateTarget[]>();
  const issues: MalformedInputError[] = [];
  let current: string | null = null;

  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const line = lines[index].trim();

    if (line.startsWith(MOLECULE_PREFIX)) {
      current = line.slice(MOLECULE_PREFIX.length).trim();
      if (current === '') {
        current = null;
        const issue = new MalformedInputError('MOLECULE line without a name', { stage: 'search', line: lineNumber });
        console.warn(`[Input] Line ${lineNumber}: ${issue.message}`);
        issues.push(issue);
        continue;
      }
      if (!lists.has(current)) lists.set(current, []);
      continue;
    }

    if (current === null || line === '' || line.startsWith('-') || line.startsWith('Rank')) {
      continue;
    }

    const [rankToken, targetId = '', scoreToken = '', ...rest] = line.split(/\s+/);
    if (!/^\d+$/.test(rankToken)) {
      continue;
    }

    const score = Number(scoreToken);
    let problem: string | null = null;
    if (!TARGET_ID_PATTERN.test(targetId)) {
      problem = `invalid target id "${targetId}"`;
    } else if (scoreToken === '' || !Number.isFinite(score)) {
      problem = `invalid similarity score "${scoreToken}"`;
    }

    if (problem !== null) {
      const issue = new MalformedInputError(`Skipping hit row: ${problem}`, {
        stage: 'search',
        identifier: current,
        line: lineNumber,
      });
      console.warn(`[Input] Line ${lineNumber}: ${issue.message}`);
      issues.push(issue);
      continue;
    }

    const organism = rest.join(' ');
    lists.get(current)?.push({
      chemicalId: current,
      targetId,
      similarityScore: score,
      sourceRank: Number(rankToken),
      ...(organism !== '' ? { organism } : {}),
    });
  }

  const records = [...lists.entries()].map(([chemicalId, candidates]) => ({ chemicalId, candidates }));
  console.log(
    `[Input] Parsed ${records.length} molecules, ` +
      `${records.reduce((sum, list) => sum + list.candidates.length, 0)} hit rows`,
  );
  return { records, issues };
}
