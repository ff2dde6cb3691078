import { Expose, Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, IsString } from 'class-validator';

import { PaginationType } from '../interface';

/**
 * Pagination scalars of a list request, as they arrive in the query string.
 */
export class PaginationQueryDto {
    @Expose()
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    page?: number;

    @Expose({ name: 'per_page' })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    perPage?: number;

    @Expose({ name: 'pagination_type' })
    @IsOptional()
    @IsEnum(PaginationType)
    paginationType?: PaginationType;

    @Expose()
    @IsOptional()
    @IsString()
    cursor?: string;
}
