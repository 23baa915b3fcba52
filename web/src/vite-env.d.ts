/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SEATSTREAM_URL?: string;
}
