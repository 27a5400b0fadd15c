/// <reference types="vite/client" />

interface ImportMetaEnv {
  /** Production endpoint serving the Aviation Weather Center METAR API */
  readonly VITE_PROXY_URL?: string;
  /** Default temperature unit, F or C */
  readonly VITE_TEMPERATURE_UNIT?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
