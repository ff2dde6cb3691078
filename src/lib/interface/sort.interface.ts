export enum SortDirection {
    ASC = 'asc',
    DESC = 'desc',
}

export interface SortOperation {
    field: string;
    direction: SortDirection;
}
