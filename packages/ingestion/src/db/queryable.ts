export interface QueryOutcome<Row> {
  rowCount: number | null;
  rows: Row[];
}

export interface Queryable<Row = unknown> {
  query: (text: string, values?: unknown[]) => Promise<QueryOutcome<Row>>;
}

export interface PooledConnection<Row = unknown> extends Queryable<Row> {
  release: (destroy?: boolean) => void;
}

export interface ConnectionSource<Row = unknown> {
  connect: () => Promise<PooledConnection<Row>>;
}
