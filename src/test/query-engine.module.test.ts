import { Test } from '@nestjs/testing';

import { PAGINATION_CONFIG } from '../lib/constants';
import { CursorCodec } from '../lib/pagination/cursor-codec';
import { QueryBuilderService } from '../lib/query-builder.service';
import { QueryBuilderServiceFactory, QueryEngineModule } from '../lib/query-engine.module';
import { FakeSqlRunner } from './fixtures/fake-sql-runner';
import { cities } from './fixtures/resources';

import type { TestingModule } from '@nestjs/testing';
import type { PaginationConfig } from '../lib/pagination/pagination.config';

describe('QueryEngineModule', () => {
    let moduleRef: TestingModule;

    beforeAll(async () => {
        moduleRef = await Test.createTestingModule({
            imports: [QueryEngineModule.forRoot({ pagination: { secret: 'test-secret', ttlSeconds: 120 } })],
        }).compile();
    });

    afterAll(async () => {
        await moduleRef.close();
    });

    it('resolves the pagination config from the options', () => {
        expect(moduleRef.get<PaginationConfig>(PAGINATION_CONFIG)).toEqual({
            secret: 'test-secret',
            issuer: 'query-engine-pagination',
            ttlSeconds: 120,
            insecureSecret: false,
        });
    });

    it('shares one codec between the services it creates', async () => {
        const codec = moduleRef.get(CursorCodec);
        const factory = moduleRef.get(QueryBuilderServiceFactory);
        const runner = new FakeSqlRunner().on('FROM cities', [{ id: 1 }, { id: 2 }]);

        const service = factory.create(cities, runner);
        const result = await service.index({ per_page: '1' });

        expect(service).toBeInstanceOf(QueryBuilderService);
        expect(factory.config.ttlSeconds).toBe(120);
        await expect(codec.validate(result.pagination.next_cursor ?? '')).resolves.toMatchObject({ position: 1, perPage: 1 });
    });

    it('wraps a TypeORM data source', async () => {
        const factory = moduleRef.get(QueryBuilderServiceFactory);
        const query = jest.fn(async (): Promise<unknown> => [{ total: '4' }]);
        const service = factory.forDataSource(cities, {
            driver: { escapeQueryWithParameters: (sql: string): [string, unknown[]] => [sql, []] },
            query,
        });

        await expect(service.count()).resolves.toBe(4);
        expect(query).toHaveBeenCalledWith('SELECT COUNT(*) AS total FROM cities', []);
    });
});
