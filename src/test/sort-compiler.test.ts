import { SortDirection } from '../lib/interface';
import { SortCompiler } from '../lib/provider/sort-compiler';

describe('SortCompiler', () => {
    describe('parse', () => {
        it('reads prefix and suffix directions in request order', () => {
            expect(SortCompiler.parse('name,-created_at,population:desc, id:asc')).toEqual([
                { field: 'name', direction: SortDirection.ASC },
                { field: 'created_at', direction: SortDirection.DESC },
                { field: 'population', direction: SortDirection.DESC },
                { field: 'id', direction: SortDirection.ASC },
            ]);
        });

        it('skips empty entries', () => {
            expect(SortCompiler.parse(',, ,')).toEqual([]);
        });
    });

    describe('compile', () => {
        it('emits the column and direction', () => {
            expect(new SortCompiler().compile('name', SortDirection.DESC)).toBe('name DESC');
            expect(new SortCompiler('cities').compile('name', SortDirection.ASC)).toBe('cities.name ASC');
        });

        it('joins several sorts in order', () => {
            const sorts = [
                { field: 'name', direction: SortDirection.ASC },
                { field: 'population', direction: SortDirection.DESC },
            ];
            expect(new SortCompiler().compileAll(sorts)).toBe('name ASC, population DESC');
        });

        it('drops entries outside the allow-list and non-identifiers', () => {
            const sorts = [
                { field: 'name', direction: SortDirection.ASC },
                { field: 'name;--', direction: SortDirection.DESC },
                { field: 'population', direction: SortDirection.DESC },
            ];
            expect(new SortCompiler().compileAll(sorts, ['name', 'name;--'])).toBe('name ASC');
        });
    });
});
