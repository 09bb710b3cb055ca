import type postgres from 'postgres'

/** The PostgreSQL client every store and the job queue run their queries through */
export type SQL = postgres.Sql
