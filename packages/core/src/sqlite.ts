// SQLite backend (better-sqlite3)
export * from './loader/sqlite';
