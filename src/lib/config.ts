export const config = {
  dbPath: process.env.SHAFT_DB_PATH || "data/shaft-db.db",
  rawDataDir: process.env.RAW_DATA_DIR || "data/raw",
  vocabularyPath: process.env.VOCABULARY_PATH || "data/vocabularies.json",
  defaultPageSize: parseInt(process.env.DEFAULT_PAGE_SIZE || "50", 10),
  maxPageSize: parseInt(process.env.MAX_PAGE_SIZE || "500", 10),
};
