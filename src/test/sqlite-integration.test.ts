import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Column, DataSource, Entity, PrimaryColumn } from 'typeorm';

import { FilterOperator } from '../lib/interface';
import { CursorCodec } from '../lib/pagination/cursor-codec';
import { TypeOrmSqlRunner } from '../lib/provider/typeorm-sql-runner';
import { QueryBuilderService } from '../lib/query-builder.service';
import { QueryBuilderServiceFactory, QueryEngineModule } from '../lib/query-engine.module';
import { belongsTo } from '../lib/relationship/relationship';
import { defineResource } from '../lib/resource-definition';
import { cities } from './fixtures/resources';

import type { TestingModule } from '@nestjs/testing';

@Entity('countries')
class Country {
    @PrimaryColumn()
    id!: number;

    @Column()
    name!: string;
}

@Entity('provinces')
class Province {
    @PrimaryColumn()
    id!: number;

    @Column()
    name!: string;

    @Column()
    country_id!: number;
}

@Entity('cities')
class City {
    @PrimaryColumn()
    id!: number;

    @Column()
    name!: string;

    @Column()
    population!: number;

    @Column({ type: 'integer', nullable: true })
    province_id!: number | null;

    @Column('varchar')
    created_at!: string;
}

@Entity('organizations')
class Organization {
    @PrimaryColumn()
    id!: number;

    @Column()
    name!: string;

    @Column({ type: 'integer', nullable: true })
    parent_id!: number | null;
}

const organizations = defineResource({
    table: 'organizations',
    allowedFields: ['id', 'name', 'parent_id'],
    defaultFields: ['id', 'name'],
    allowedFilters: ['name'],
    allowedSorts: ['id'],
    allowedIncludes: ['parent'],
    relationships: {
        parent: belongsTo('organizations', 'parent_id', 'id', { eager: true, select: ['id', 'name'] }),
    },
});

// Cursor timestamps are issued at this instant; rows created after it sort past the first page's cursor.
const NOW = Date.parse('2024-01-02T12:00:00.000Z');

describe('Query engine on sqlite', () => {
    let moduleRef: TestingModule;
    let dataSource: DataSource;
    let service: QueryBuilderService;

    beforeAll(async () => {
        moduleRef = await Test.createTestingModule({
            imports: [
                TypeOrmModule.forRoot({
                    type: 'sqlite',
                    database: ':memory:',
                    entities: [Country, Province, City, Organization],
                    synchronize: true,
                    logging: false,
                }),
                QueryEngineModule.forRoot({ pagination: { secret: 'test-secret' } }),
            ],
        }).compile();

        dataSource = moduleRef.get(DataSource);
        service = moduleRef.get(QueryBuilderServiceFactory).forDataSource(cities, dataSource, { dialect: 'sqlite' });

        await dataSource.getRepository(Country).insert([
            { id: 10, name: 'Germany' },
            { id: 11, name: 'France' },
        ]);
        await dataSource.getRepository(Province).insert([
            { id: 5, name: 'Brandenburg', country_id: 10 },
            { id: 6, name: 'Normandy', country_id: 11 },
        ]);
        await dataSource.getRepository(City).insert([
            { id: 1, name: 'Berlin', population: 3_600_000, province_id: 5, created_at: '2024-01-01T00:00:00.000Z' },
            { id: 2, name: 'Potsdam', population: 180_000, province_id: 5, created_at: '2024-01-02T00:00:00.000Z' },
            { id: 3, name: 'Rouen', population: 110_000, province_id: 6, created_at: '2024-01-03T00:00:00.000Z' },
            { id: 4, name: "Caen's Port", population: 105_000, province_id: 6, created_at: '2024-01-04T00:00:00.000Z' },
            { id: 5, name: 'Atlantis', population: 0, province_id: null, created_at: '2024-01-05T00:00:00.000Z' },
        ]);
        await dataSource.getRepository(Organization).insert([
            { id: 1, name: 'Acme', parent_id: null },
            { id: 2, name: 'Acme Labs', parent_id: 1 },
            { id: 3, name: 'Acme Robotics', parent_id: 2 },
        ]);
    });

    beforeEach(() => {
        jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    afterAll(async () => {
        await moduleRef.close();
    });

    describe('filters', () => {
        it('binds a value containing a quote', async () => {
            await expect(service.all(service.query().whereEq('name', "Caen's Port"))).resolves.toEqual([{ id: 4, name: "Caen's Port" }]);
        });

        it('combines request filters and counts the matches', async () => {
            const result = await service.index({
                'filter[name][contains]': 'O',
                'filter[population][gte]': '110000',
                pagination_type: 'offset',
            });

            expect(result.data).toEqual([
                { id: 2, name: 'Potsdam' },
                { id: 3, name: 'Rouen' },
            ]);
            expect(result.pagination.total).toBe(2);
        });

        it('ORs runs of conditions', async () => {
            const builder = service.query().whereEq('name', 'Berlin').orWhere('population', FilterOperator.LT, 150_000);

            await expect(service.all(builder)).resolves.toEqual([
                { id: 1, name: 'Berlin' },
                { id: 3, name: 'Rouen' },
                { id: 4, name: "Caen's Port" },
                { id: 5, name: 'Atlantis' },
            ]);
        });
    });

    it('returns the requested offset page', async () => {
        const result = await service.index({ sort: '-population', page: '2', per_page: '2', pagination_type: 'offset' }, { path: '/cities' });

        expect(result.data).toEqual([
            { id: 3, name: 'Rouen' },
            { id: 4, name: "Caen's Port" },
        ]);
        expect(result.pagination).toMatchObject({
            current_page: 2,
            total: 5,
            total_pages: 3,
            from: 3,
            to: 4,
            next_page_url: '/cities?page=3&per_page=2',
        });
    });

    it('follows a cursor to the rows past it', async () => {
        const codec = new CursorCodec({ secret: 'test-secret', clock: () => NOW });
        const cursorService = new QueryBuilderService(cities, new TypeOrmSqlRunner(dataSource), codec, { dialect: 'sqlite' });

        const first = await cursorService.index({ sort: 'created_at', per_page: '2' });
        expect(first.data).toEqual([
            { id: 1, name: 'Berlin' },
            { id: 2, name: 'Potsdam' },
        ]);
        expect(first.pagination.has_more_pages).toBe(true);

        const second = await cursorService.index({ sort: 'created_at', per_page: '2', cursor: first.pagination.next_cursor ?? '' });
        expect(second.data).toEqual([
            { id: 3, name: 'Rouen' },
            { id: 4, name: "Caen's Port" },
        ]);
        expect(second.pagination.has_more_pages).toBe(true);
        expect(second.pagination.prev_cursor).not.toBeNull();
    });

    it('loads nested includes in batches', async () => {
        const result = await service.execute(service.query().include('province.country').perPage(10));

        expect(result.data).toEqual([
            {
                id: 1,
                name: 'Berlin',
                province_id: 5,
                province: { id: 5, name: 'Brandenburg', country_id: 10, country: { id: 10, name: 'Germany' } },
            },
            {
                id: 2,
                name: 'Potsdam',
                province_id: 5,
                province: { id: 5, name: 'Brandenburg', country_id: 10, country: { id: 10, name: 'Germany' } },
            },
            {
                id: 3,
                name: 'Rouen',
                province_id: 6,
                province: { id: 6, name: 'Normandy', country_id: 11, country: { id: 11, name: 'France' } },
            },
            {
                id: 4,
                name: "Caen's Port",
                province_id: 6,
                province: { id: 6, name: 'Normandy', country_id: 11, country: { id: 11, name: 'France' } },
            },
            { id: 5, name: 'Atlantis', province_id: null, province: null },
        ]);
    });

    it('folds a self-referencing include into one aliased JOIN', async () => {
        const organizationService = moduleRef.get(QueryBuilderServiceFactory).forDataSource(organizations, dataSource, { dialect: 'sqlite' });

        const result = await organizationService.index({ include: 'parent', per_page: '10' });

        expect(result.data).toEqual([
            { id: 1, name: 'Acme', parent: null },
            { id: 2, name: 'Acme Labs', parent: { id: 1, name: 'Acme' } },
            { id: 3, name: 'Acme Robotics', parent: { id: 2, name: 'Acme Labs' } },
        ]);
    });
});
