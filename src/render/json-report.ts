import type { Report, Section } from '../types/host-health.js';

export interface SerializedSection {
    Title: string;
    Data: Section['Data'];
    Severity: Section['Severity'];
}

export interface SerializedReport {
    GeneratedAt: string;
    Sections: SerializedSection[];
}

/** Wire shape of the report: the domain tag is internal and not emitted. */
export function toSerializableReport(report: Report): SerializedReport {
    return {
        GeneratedAt: report.GeneratedAt,
        Sections: report.Sections.map(({ Title, Data, Severity }) => ({ Title, Data, Severity })),
    };
}

export function renderJsonReport(report: Report): string {
    return `${JSON.stringify(toSerializableReport(report), null, 2)}\n`;
}
