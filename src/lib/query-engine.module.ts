import { Inject, Injectable, Module } from '@nestjs/common';

import { PAGINATION_CONFIG } from './constants';
import { CursorCodec } from './pagination/cursor-codec';
import { resolvePaginationConfig } from './pagination/pagination.config';
import { TypeOrmSqlRunner } from './provider/typeorm-sql-runner';
import { QueryBuilderService } from './query-builder.service';

import type { DynamicModule } from '@nestjs/common';
import type { SqlRunner, ResourceDefinition } from './interface';
import type { PaginationConfig, PaginationConfigOptions } from './pagination/pagination.config';
import type { QueryableDataSource } from './provider/typeorm-sql-runner';
import type { QueryBuilderServiceOptions } from './query-builder.service';

export interface QueryEngineModuleOptions {
    pagination?: PaginationConfigOptions;
    /**
     * Register the providers globally.
     * @default false
     */
    isGlobal?: boolean;
}

@Injectable()
export class QueryBuilderServiceFactory {
    constructor(
        private readonly codec: CursorCodec,
        @Inject(PAGINATION_CONFIG) readonly config: PaginationConfig,
    ) {}

    create(definition: ResourceDefinition, runner: SqlRunner, options: QueryBuilderServiceOptions = {}): QueryBuilderService {
        return new QueryBuilderService(definition, runner, this.codec, options);
    }

    forDataSource(definition: ResourceDefinition, dataSource: QueryableDataSource, options: QueryBuilderServiceOptions = {}): QueryBuilderService {
        return this.create(definition, new TypeOrmSqlRunner(dataSource), options);
    }
}

@Module({})
export class QueryEngineModule {
    static forRoot(options: QueryEngineModuleOptions = {}): DynamicModule {
        return {
            module: QueryEngineModule,
            global: options.isGlobal ?? false,
            providers: [
                {
                    provide: PAGINATION_CONFIG,
                    useFactory: () => resolvePaginationConfig(options.pagination),
                },
                {
                    provide: CursorCodec,
                    useFactory: (config: PaginationConfig) => new CursorCodec(config),
                    inject: [PAGINATION_CONFIG],
                },
                QueryBuilderServiceFactory,
            ],
            exports: [PAGINATION_CONFIG, CursorCodec, QueryBuilderServiceFactory],
        };
    }
}
