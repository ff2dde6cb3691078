import { Expose } from 'class-transformer';
import { IsInt, IsPositive, Max, Min } from 'class-validator';

import { MAX_PER_PAGE, MIN_PER_PAGE } from '../constants';

/**
 * `cursor` claim of a decoded pagination token.
 */
export class CursorDataDto {
    @Expose()
    @IsInt()
    @IsPositive()
    timestamp!: number;

    @Expose()
    @IsInt()
    @Min(0)
    position!: number;

    @Expose({ name: 'per_page' })
    @IsInt()
    @Min(MIN_PER_PAGE)
    @Max(MAX_PER_PAGE)
    perPage!: number;
}
