// Embedded key/value backend (lmdb)
export * from './loader/lmdb';
