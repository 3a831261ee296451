import fs from 'fs-extra';

export function backupPathFor(documentPath: string): string {
    return `${documentPath}.bak`;
}

/**
 * Writes the previous text to `<path>.bak`, then the new text to `<path>`.
 * Returns the backup path.
 */
export async function writeWithBackup(documentPath: string, previous: string, next: string): Promise<string> {
    const backupPath = backupPathFor(documentPath);
    await fs.writeFile(backupPath, previous, 'utf-8');
    if (next !== previous) {
        await fs.writeFile(documentPath, next, 'utf-8');
    }
    return backupPath;
}
