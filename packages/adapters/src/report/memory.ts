import { type ReportSink } from '@chatprobe/core';

export class MemoryReportSink implements ReportSink {
    public readonly location = 'memory://report';
    public readonly lines: string[] = [];

    public async append(lines: readonly string[]): Promise<void> {
        this.lines.push(...lines);
    }
}
