import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const sheets = sqliteTable('sheets', {
  name: text('name').primaryKey(),
  createdAt: text('created_at').notNull(),
});

export const sheetRows = sqliteTable('sheet_rows', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sheetName: text('sheet_name').notNull().references(() => sheets.name, {
    onUpdate: 'cascade',
    onDelete: 'cascade',
  }),
  /** 1-based row number within the sheet; row 1 is the header */
  position: integer('position').notNull(),
  /** JSON array of cell strings, stored as TEXT */
  cells: text('cells').notNull(),
}, (table) => [
  index('idx_sheet_rows_position').on(table.sheetName, table.position),
]);
