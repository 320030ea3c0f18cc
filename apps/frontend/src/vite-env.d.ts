/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_LOG_LEVEL?: string;
  readonly VITE_CAPSULE_EDGE?: string;
  readonly VITE_CAPSULE_Y_OFFSET?: string;
  readonly VITE_CAPSULE_TIMEOUT_SECONDS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
