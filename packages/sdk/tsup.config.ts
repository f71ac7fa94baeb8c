import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'wallet/index': 'src/wallet/index.ts',
    'tx/index': 'src/tx/index.ts',
    'account/index': 'src/account/index.ts',
    'broadcast/index': 'src/broadcast/index.ts',
    'rpc/index': 'src/rpc/index.ts',
    'client/index': 'src/client/index.ts',
    'utils/index': 'src/utils/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  external: ['cosmjs-types', 'pino'],
});
