import { TypeOrmSqlRunner } from '../lib/provider/typeorm-sql-runner';

import type { QueryableDataSource } from '../lib/provider/typeorm-sql-runner';

describe('TypeOrmSqlRunner', () => {
    const createDataSource = (result: unknown) => {
        const escapeQueryWithParameters = jest.fn((sql: string, params: Record<string, unknown>): [string, unknown[]] => [
            sql.replace(':...ids', '$1, $2').replace(':name', '$3'),
            [...(Array.isArray(params.ids) ? params.ids : []), params.name],
        ]);
        const query = jest.fn(async (_query: string, _parameters?: unknown[]): Promise<unknown> => result);
        const dataSource: QueryableDataSource = { driver: { escapeQueryWithParameters }, query };
        return { dataSource, escapeQueryWithParameters, query };
    };

    it('expands named parameters through the driver before running the query', async () => {
        const { dataSource, escapeQueryWithParameters, query } = createDataSource([{ id: 1 }, { id: 2 }]);
        const runner = new TypeOrmSqlRunner(dataSource);

        const rows = await runner.query('SELECT * FROM cities WHERE id IN (:...ids) AND name = :name', { ids: [1, 2], name: 'Berlin' });

        expect(escapeQueryWithParameters).toHaveBeenCalledWith(
            'SELECT * FROM cities WHERE id IN (:...ids) AND name = :name',
            { ids: [1, 2], name: 'Berlin' },
            {},
        );
        expect(query).toHaveBeenCalledWith('SELECT * FROM cities WHERE id IN ($1, $2) AND name = $3', [1, 2, 'Berlin']);
        expect(rows).toEqual([{ id: 1 }, { id: 2 }]);
    });

    it('returns no rows for results that are not row lists', async () => {
        const { dataSource } = createDataSource({ affected: 3 });

        await expect(new TypeOrmSqlRunner(dataSource).query('SELECT 1', {})).resolves.toEqual([]);
    });

    it('skips entries that are not rows', async () => {
        const { dataSource } = createDataSource([{ id: 1 }, null, 7]);

        await expect(new TypeOrmSqlRunner(dataSource).query('SELECT id FROM cities', {})).resolves.toEqual([{ id: 1 }]);
    });

    it('propagates driver errors', async () => {
        const { dataSource, query } = createDataSource([]);
        query.mockRejectedValueOnce(new Error('relation "cities" does not exist'));

        await expect(new TypeOrmSqlRunner(dataSource).query('SELECT * FROM cities', {})).rejects.toThrow('relation "cities" does not exist');
    });
});
