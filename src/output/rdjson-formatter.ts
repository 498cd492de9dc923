import { Severity, type Diagnostic } from '../analysis/types';

export type RdJsonSeverity = 'ERROR' | 'WARNING' | 'INFO';

export interface RdJsonPosition {
    line: number;
    column: number;
}

export interface RdJsonDiagnostic {
    message: string;
    location: {
        path: string;
        range: {
            start: RdJsonPosition;
            end?: RdJsonPosition;
        };
    };
    severity: RdJsonSeverity;
    source?: {
        name: string;
    };
    code?: {
        value: string;
    };
}

export interface RdJsonResult {
    source: {
        name: string;
    };
    diagnostics: RdJsonDiagnostic[];
}

// rdjson has no hint level
function toRdJsonSeverity(severity: Severity): RdJsonSeverity {
    switch (severity) {
        case Severity.ERROR:
            return 'ERROR';
        case Severity.WARNING:
            return 'WARNING';
        case Severity.INFO:
        case Severity.HINT:
            return 'INFO';
    }
}

/*
 * Reviewdog diagnostic format (rdjson). Tool names are kept per diagnostic
 * so reviewers can tell which analyzer raised a finding.
 */
export class RdJsonFormatter {
    private diagnostics: Diagnostic[] = [];

    addDiagnostics(diagnostics: readonly Diagnostic[]): void {
        this.diagnostics.push(...diagnostics);
    }

    toRdJsonFormat(): RdJsonResult {
        const diagnostics = this.diagnostics.map((d) => {
            const diagnostic: RdJsonDiagnostic = {
                message: d.message,
                location: {
                    path: d.location.file,
                    range: {
                        start: {
                            line: d.location.line,
                            column: d.location.column,
                        },
                    },
                },
                severity: toRdJsonSeverity(d.severity),
            };

            if (d.location.endLine !== undefined) {
                diagnostic.location.range.end = {
                    line: d.location.endLine,
                    column: d.location.endColumn ?? d.location.column,
                };
            }
            if (d.source) {
                diagnostic.source = { name: d.source };
            }
            if (d.code) {
                diagnostic.code = { value: d.code };
            }
            return diagnostic;
        });

        return {
            source: {
                name: 'lintmux',
            },
            diagnostics,
        };
    }

    toJson(): string {
        return JSON.stringify(this.toRdJsonFormat(), null, 2);
    }
}
