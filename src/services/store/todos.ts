/**
 * Todos for profiles, projects and profile services
 *
 * The three kinds share a shape but live in separate tables so each can
 * cascade with its own parent.
 */

import { z } from 'zod';
import { mutate, parseInput, read, type Db } from './database.js';
import { NotFoundError } from '../../utils/errors.js';
import { nowSeconds } from '../../utils/format.js';
import type { Todo, TodoKind } from '../../types/index.js';

interface TodoRow {
  id: number;
  parent_id: number;
  text: string;
  completed: number;
  created_ts: number;
}

interface TodoTable {
  table: string;
  parentColumn: string;
  parentTable: string;
  parentEntity: string;
}

export const TODO_KINDS = ['profile', 'project', 'profile_service'] as const satisfies readonly TodoKind[];

const TODO_TABLES: Record<TodoKind, TodoTable> = {
  profile: {
    table: 'profile_todos',
    parentColumn: 'profile_id',
    parentTable: 'profiles',
    parentEntity: 'Profile',
  },
  project: {
    table: 'project_todos',
    parentColumn: 'project_id',
    parentTable: 'projects',
    parentEntity: 'Project',
  },
  profile_service: {
    table: 'profile_service_todos',
    parentColumn: 'profile_service_id',
    parentTable: 'profile_services',
    parentEntity: 'ProfileService',
  },
};

const textSchema = z.string().trim().min(1, 'Todo text is required');

function toTodo(kind: TodoKind, row: TodoRow): Todo {
  return {
    id: row.id,
    kind,
    parentId: row.parent_id,
    text: row.text,
    completed: row.completed === 1,
    createdTs: row.created_ts,
  };
}

export function getTodo(db: Db, kind: TodoKind, id: number): Todo | null {
  const { table, parentColumn } = TODO_TABLES[kind];
  return read(() => {
    const row = db
      .prepare<[number], TodoRow>(
        `SELECT id, ${parentColumn} AS parent_id, text, completed, created_ts FROM ${table} WHERE id = ?`
      )
      .get(id);
    return row ? toTodo(kind, row) : null;
  });
}

function requireTodo(db: Db, kind: TodoKind, id: number): Todo {
  const todo = getTodo(db, kind, id);
  if (!todo) {
    throw new NotFoundError('Todo', id);
  }
  return todo;
}

export function listTodos(db: Db, kind: TodoKind, parentId: number): Todo[] {
  const { table, parentColumn } = TODO_TABLES[kind];
  return read(() =>
    db
      .prepare<[number], TodoRow>(
        `SELECT id, ${parentColumn} AS parent_id, text, completed, created_ts FROM ${table}
         WHERE ${parentColumn} = ? ORDER BY created_ts ASC, id ASC`
      )
      .all(parentId)
      .map((row) => toTodo(kind, row))
  );
}

export function addTodo(
  db: Db,
  kind: TodoKind,
  parentId: number,
  text: string,
  now: number = nowSeconds()
): Todo {
  const { table, parentColumn, parentTable, parentEntity } = TODO_TABLES[kind];
  const body = parseInput(textSchema, text);

  return mutate(db, () => {
    const parent = db
      .prepare<[number], { id: number }>(`SELECT id FROM ${parentTable} WHERE id = ?`)
      .get(parentId);
    if (!parent) {
      throw new NotFoundError(parentEntity, parentId);
    }

    const result = db
      .prepare(
        `INSERT INTO ${table} (${parentColumn}, text, completed, created_ts) VALUES (?, ?, 0, ?)`
      )
      .run(parentId, body, now);
    return requireTodo(db, kind, Number(result.lastInsertRowid));
  });
}

export function setTodoCompleted(db: Db, kind: TodoKind, id: number, completed: boolean): Todo {
  const { table } = TODO_TABLES[kind];
  return mutate(db, () => {
    const result = db
      .prepare(`UPDATE ${table} SET completed = ? WHERE id = ?`)
      .run(completed ? 1 : 0, id);
    if (result.changes === 0) {
      throw new NotFoundError('Todo', id);
    }
    return requireTodo(db, kind, id);
  });
}

export function updateTodoText(db: Db, kind: TodoKind, id: number, text: string): Todo {
  const { table } = TODO_TABLES[kind];
  const body = parseInput(textSchema, text);

  return mutate(db, () => {
    const result = db.prepare(`UPDATE ${table} SET text = ? WHERE id = ?`).run(body, id);
    if (result.changes === 0) {
      throw new NotFoundError('Todo', id);
    }
    return requireTodo(db, kind, id);
  });
}

export function deleteTodo(db: Db, kind: TodoKind, id: number): void {
  const { table } = TODO_TABLES[kind];
  mutate(db, () => {
    const result = db.prepare(`DELETE FROM ${table} WHERE id = ?`).run(id);
    if (result.changes === 0) {
      throw new NotFoundError('Todo', id);
    }
  });
}
