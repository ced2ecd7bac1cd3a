import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    clearMocks: true,
    env: {
      // Keep @grpc/grpc-js from reading the host's default root CA bundle
      // through the mocked fs.readFileSync.
      GRPC_DEFAULT_SSL_ROOTS_FILE_PATH: '',
    },
  },
})
