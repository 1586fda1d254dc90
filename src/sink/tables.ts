export type ColumnType = 'STRING' | 'INT' | 'NAIVE_DATE' | 'UTC_DATETIME';

export interface TableDefinition {
  table: string;
  primaryKey: string[];
  columns: Record<string, ColumnType>;
}

/**
 * Destination tables as announced to the host framework.
 */
export function describeTables(): TableDefinition[] {
  return [
    {
      table: 'vehicle_details',
      primaryKey: ['vin'],
      columns: {
        vin: 'STRING',
        make: 'STRING',
        model: 'STRING',
        model_year: 'INT',
        engine_type: 'STRING',
        plant: 'STRING',
        series: 'STRING',
        body_type: 'STRING',
        transmission: 'STRING',
        drive_type: 'STRING',
        created_at: 'UTC_DATETIME',
        updated_at: 'UTC_DATETIME',
      },
    },
    {
      table: 'recalls',
      primaryKey: ['vin', 'recall_id'],
      columns: {
        vin: 'STRING',
        recall_id: 'STRING',
        summary: 'STRING',
        recall_date: 'NAIVE_DATE',
        component: 'STRING',
        consequence: 'STRING',
        remedy: 'STRING',
        created_at: 'UTC_DATETIME',
      },
    },
  ];
}
