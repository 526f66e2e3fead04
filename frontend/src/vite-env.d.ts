/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_IMAGE_SIZE?: string;
}
