/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_ESTIMATE_API_URL?: string;
  readonly VITE_EXPORT_TIMEOUT_MS?: string;
  readonly VITE_PRICE_POLICY?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
