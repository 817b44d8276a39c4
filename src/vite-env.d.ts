/// <reference types="vite/client" />
interface ImportMetaEnv {
  readonly VITE_LOG_LEVEL?: string;
  readonly VITE_PETS_API_URL?: string;
  readonly VITE_HTTP_ADAPTER?: string;
  readonly VITE_PETS_KEEP_FILTER_ON_DELETE?: string;
}
interface ImportMeta {
  readonly env: ImportMetaEnv;
}
