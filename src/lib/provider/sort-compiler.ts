import { SortDirection } from '../interface';
import { isSafeIdentifier, qualify } from './sql-fragment';

import type { SortOperation } from '../interface';

export class SortCompiler {
    constructor(private readonly table?: string) {}

    /**
     * Accepts `name`, `-name`, `name:desc` and `name:asc`, comma separated.
     */
    static parse(sort: string): SortOperation[] {
        const sorts: SortOperation[] = [];

        for (const raw of sort.split(',')) {
            let field = raw.trim();
            if (!field) continue;

            let direction = SortDirection.ASC;
            if (field.startsWith('-')) {
                direction = SortDirection.DESC;
                field = field.slice(1);
            }

            const separator = field.lastIndexOf(':');
            if (separator !== -1) {
                const suffix = field.slice(separator + 1).toLowerCase();
                if (suffix === SortDirection.DESC || suffix === SortDirection.ASC) {
                    direction = suffix === SortDirection.DESC ? SortDirection.DESC : SortDirection.ASC;
                    field = field.slice(0, separator);
                }
            }

            field = field.trim();
            if (field) {
                sorts.push({ field, direction });
            }
        }

        return sorts;
    }

    compile(column: string, direction: SortDirection): string {
        return `${qualify(column, this.table)} ${direction === SortDirection.DESC ? 'DESC' : 'ASC'}`;
    }

    /**
     * ORDER BY body in request order. Entries outside `allowed` or that are not identifiers are dropped.
     */
    compileAll(sorts: readonly SortOperation[], allowed?: readonly string[]): string {
        return sorts
            .filter((sort) => isSafeIdentifier(sort.field))
            .filter((sort) => !allowed || allowed.includes(sort.field))
            .map((sort) => this.compile(sort.field, sort.direction))
            .join(', ');
    }
}
