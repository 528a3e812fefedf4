declare global {
    namespace NodeJS {
      interface ProcessEnv {
        LOG_LEVEL?: string;
        VECTOR_EPSILON?: string;
      }
    }
  }

  export {};
