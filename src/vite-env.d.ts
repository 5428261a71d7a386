/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DATASET_URL?: string;
  readonly VITE_EXPORT_FILENAME?: string;
  readonly VITE_TABLE_PAGE_SIZE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
