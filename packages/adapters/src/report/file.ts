import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { type ReportSink } from '@chatprobe/core';

export class FileReportSink implements ReportSink {
    public readonly location: string;

    public constructor(path: string) {
        this.location = resolve(path);
    }

    public async append(lines: readonly string[]): Promise<void> {
        await mkdir(dirname(this.location), { recursive: true });
        await appendFile(this.location, lines.map((line) => `${line}\n`).join(''), 'utf8');
    }
}
