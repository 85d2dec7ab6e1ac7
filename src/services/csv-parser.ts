import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { ComposeJob } from '../types';
import { logger } from './logger';

// Type for CSV record with flexible column names
type CsvRecord = Record<string, string | undefined>;

function pick(record: CsvRecord, names: string[]): string | undefined {
    for (const name of names) {
        const value = record[name]?.trim();
        if (value) return value;
    }
    return undefined;
}

/**
 * Parse a batch CSV with recipient and prompt columns (tone, type and
 * max_length are optional) into compose jobs.
 */
export function parseComposeCsv(filePath: string): ComposeJob[] {
    if (!fs.existsSync(filePath)) {
        throw new Error(`CSV file not found: ${filePath}`);
    }

    logger.info(`Parsing CSV file: ${filePath}`);
    const content = fs.readFileSync(filePath, 'utf-8');

    const records: CsvRecord[] = parse(content, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
    });

    const jobs: ComposeJob[] = [];

    for (const record of records) {
        // Support multiple column name variations
        const recipient = pick(record, ['recipient', 'Recipient', 'email', 'Email', 'to', 'To']);
        const prompt = pick(record, ['prompt', 'Prompt', 'request', 'Request']);
        const tone = pick(record, ['tone', 'Tone']);
        const emailType = pick(record, ['type', 'Type', 'email_type', 'emailType']);
        const maxLength = Number(pick(record, ['max_length', 'maxLength']));

        if (!recipient || !prompt) {
            logger.warn(`Skipping row: missing required fields (recipient or prompt)`, record);
            continue;
        }

        const job: ComposeJob = { recipient, prompt };
        if (tone) job.tone = tone;
        if (emailType) job.emailType = emailType;
        if (Number.isInteger(maxLength) && maxLength > 0) job.maxLength = maxLength;
        jobs.push(job);
    }

    return jobs;
}
