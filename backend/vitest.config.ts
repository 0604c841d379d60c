import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      reporter: ['text', 'html'],
      exclude: ['dist', 'node_modules', 'scripts']
    }
  }
})

/*
解説:

1) import { defineConfig } from 'vitest/config'
  - Vitest の設定ヘルパーを利用して型補完とバリデーションを効かせる。

2) test オプション
  - Node.js 環境でグローバル API を有効化し、`src` 配下の test/spec ファイルのみを対象にする。
  - シミュレーションはタイマー以外に外部依存がないため、jsdom などの環境は不要。
  - `scripts/` のヘッドレス対戦デモはカバレッジ対象から外す。
*/
