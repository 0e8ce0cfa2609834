/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_MINESWEEPER_DIMENSIONS?: string
  readonly VITE_MINESWEEPER_MINES?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
