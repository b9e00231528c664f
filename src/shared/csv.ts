/**
 * CSV helpers for the run ledger, transcript CSV export and stats files.
 * Fields containing a comma, quote or line break are quoted; quotes are doubled.
 */

export type CsvValue = string | number | boolean | null | undefined;

export function escapeCsvField(value: CsvValue): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    if (/[",\r\n]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}

/**
 * Format one CSV line (terminated by "\n")
 */
export function formatCsvRow(values: CsvValue[]): string {
    return values.map(escapeCsvField).join(',') + '\n';
}

/**
 * Format a header line followed by one line per record, columns in header order
 */
export function formatCsv(headers: readonly string[], records: Record<string, CsvValue>[]): string {
    let out = formatCsvRow([...headers]);
    for (const record of records) {
        out += formatCsvRow(headers.map(h => record[h]));
    }
    return out;
}

/**
 * Parse CSV content with quoted fields and multiline values.
 * Returns an array of objects keyed by the header row.
 */
export function parseCSV(content: string): Record<string, string>[] {
    const lines: string[][] = [];
    let currentRow: string[] = [];
    let currentCell = '';
    let inQuotes = false;

    const text = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

    for (let i = 0; i < text.length; i++) {
        const char = text[i];

        if (inQuotes) {
            if (char === '"') {
                if (text[i + 1] === '"') {
                    currentCell += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                currentCell += char;
            }
        } else if (char === '"') {
            inQuotes = true;
        } else if (char === ',') {
            currentRow.push(currentCell);
            currentCell = '';
        } else if (char === '\n') {
            currentRow.push(currentCell);
            lines.push(currentRow);
            currentRow = [];
            currentCell = '';
        } else {
            currentCell += char;
        }
    }

    if (currentRow.length > 0 || currentCell.length > 0) {
        currentRow.push(currentCell);
        lines.push(currentRow);
    }

    if (lines.length < 2) return [];

    const headers = lines[0].map(h => h.trim());
    const result: Record<string, string>[] = [];

    for (let i = 1; i < lines.length; i++) {
        const row = lines[i];
        if (row.length === 1 && row[0].trim() === '') continue;

        const obj: Record<string, string> = {};
        for (let j = 0; j < headers.length; j++) {
            obj[headers[j]] = row[j] ?? '';
        }
        result.push(obj);
    }

    return result;
}
