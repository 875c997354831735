// PostgreSQL returns bigint and numeric aggregates (SUM, COUNT) as strings
export function toInt(value: number | string | null | undefined): number {
     if (value === null || value === undefined) {
          return 0;
     }
     return parseInt(String(value), 10);
}

export function isPositiveInteger(value: number): boolean {
     return Number.isInteger(value) && value > 0;
}

export function isNonNegativeInteger(value: number): boolean {
     return Number.isInteger(value) && value >= 0;
}
