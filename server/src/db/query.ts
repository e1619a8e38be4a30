/**
 * Query compiler.
 * Turns a Query into one parameterized SELECT; user values only ever travel as bound parameters.
 */

import type { Query, SortField, SortOrder } from './db.js';
import { MEDIA_COLUMNS, categoryToCode, statusToCode } from './schema.js';

export type SqlParam = string | number;

export interface CompiledQuery {
  sql: string;
  params: SqlParam[];
}

interface Predicate {
  clause: string;
  value: SqlParam;
}

// Ties break on fixed secondary keys; unrated rows sort last in both directions.
const ORDER_BY: Record<SortField, Record<SortOrder, string>> = {
  Title: { Asc: 'title ASC', Desc: 'title DESC' },
  Category: { Asc: 'category ASC, title ASC', Desc: 'category DESC, title ASC' },
  Status: { Asc: 'status ASC, updated_at DESC', Desc: 'status DESC, updated_at DESC' },
  Rating: { Asc: 'rating ASC NULLS LAST, title ASC', Desc: 'rating DESC NULLS LAST, title ASC' },
  CreatedAt: { Asc: 'created_at ASC', Desc: 'created_at DESC' },
  UpdatedAt: { Asc: 'updated_at ASC', Desc: 'updated_at DESC' },
};

export function orderByClause(field: SortField, order: SortOrder): string {
  return ORDER_BY[field][order];
}

/** Accumulates (predicate, value) pairs; compiled once at the end. */
export class ListQueryBuilder {
  private readonly predicates: Predicate[] = [];
  private orderBy = orderByClause('Title', 'Asc');

  where(clause: string, value: SqlParam): this {
    this.predicates.push({ clause, value });
    return this;
  }

  sortBy(field: SortField, order: SortOrder): this {
    this.orderBy = orderByClause(field, order);
    return this;
  }

  compile(): CompiledQuery {
    let sql = `SELECT ${MEDIA_COLUMNS} FROM media`;
    if (this.predicates.length > 0) {
      sql += ` WHERE ${this.predicates.map((p) => p.clause).join(' AND ')}`;
    }
    sql += ` ORDER BY ${this.orderBy}`;
    return { sql, params: this.predicates.map((p) => p.value) };
  }
}

/**
 * Predicates are emitted in a fixed order: title, category, status, rating.
 * instr() keeps the title match case-sensitive, unlike LIKE.
 */
export function compileListQuery(query: Query): CompiledQuery {
  const builder = new ListQueryBuilder();

  const title = query.titleContains?.trim() ?? '';
  if (title !== '') builder.where('instr(title, ?) > 0', title);
  if (query.category !== undefined) builder.where('category = ?', categoryToCode(query.category));
  if (query.status !== undefined) builder.where('status = ?', statusToCode(query.status));
  if (query.minRating !== undefined) builder.where('rating >= ?', query.minRating);

  return builder.sortBy(query.sortField, query.sortOrder).compile();
}
