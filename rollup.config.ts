// See: https://rollupjs.org/introduction/

import commonjs from '@rollup/plugin-commonjs'
import json from '@rollup/plugin-json'
import nodeResolve from '@rollup/plugin-node-resolve'
import typescript from '@rollup/plugin-typescript'
import { existsSync } from 'fs'

// Each app is bundled from <app>/src/index.ts to <app>/dist/index.js
const apps = ['observer', 'receiver']

const configs = apps
  .filter((app) => existsSync(`${app}/src/index.ts`))
  .map((app) => ({
    input: `${app}/src/index.ts`,
    output: {
      esModule: true,
      file: `${app}/dist/index.js`,
      format: 'es',
      sourcemap: true
    },
    plugins: [
      json(),
      typescript({
        tsconfig: './tsconfig.json',
        compilerOptions: {
          noEmit: false,
          outDir: undefined,
          declaration: false
        }
      }),
      nodeResolve({ preferBuiltins: true }),
      commonjs()
    ]
  }))

export default configs
