/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DAILY_CSV_URL?: string
  readonly VITE_WEEKLY_CSV_URL?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
