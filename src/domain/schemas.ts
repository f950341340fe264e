import { z } from 'zod';
import { SPORTS, STAGES } from './contracts';
import type { DataTable, ParamRecord, TableSet } from './contracts';

export const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const paramRecordSchema = z.record(z.string(), scalarSchema);

export const paramRecordListSchema = z.array(paramRecordSchema);

export const oddsTypesSchema = z.array(z.string().min(1));

export const dataTableSchema = z
  .object({
    columns: z.array(z.string()),
    rows: z.array(z.record(z.string(), scalarSchema)),
  })
  .superRefine((table, ctx) => {
    const known = new Set(table.columns);
    table.rows.forEach((row, index) => {
      const unknown = Object.keys(row).find((key) => !known.has(key));
      if (unknown !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', index, unknown],
          message: `Column "${unknown}" is not declared`,
        });
      }
    });
  });

export const trainTableSetSchema = z.object({
  features: dataTableSchema,
  targets: dataTableSchema,
  odds: dataTableSchema.nullable(),
});

export const fixtureTableSetSchema = z.object({
  features: dataTableSchema,
  targets: z.null(),
  odds: dataTableSchema.nullable(),
});

export const sportSchema = z.enum(SPORTS);

export const stageSchema = z.enum(STAGES);

export function parseParamRecords(payload: unknown): ParamRecord[] {
  return paramRecordListSchema.parse(payload);
}

export function parseOddsTypes(payload: unknown): string[] {
  return oddsTypesSchema.parse(payload);
}

export function parseTrainTables(payload: unknown): TableSet {
  return trainTableSetSchema.parse(payload);
}

export function parseFixtureTables(payload: unknown): TableSet {
  return fixtureTableSetSchema.parse(payload);
}

export function parseDataTable(payload: unknown): DataTable {
  return dataTableSchema.parse(payload);
}
