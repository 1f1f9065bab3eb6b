declare namespace NodeJS {
  interface ProcessEnv {
    REFACTOR_MODEL?: string
    REFACTOR_MAX_CODE_TOKENS?: string
    REFACTOR_CONCERNS?: string
    REFACTOR_JSON_OUTPUT?: string
    DEV_LOG?: string
  }
}
