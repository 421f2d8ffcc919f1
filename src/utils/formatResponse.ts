import * as prettier from 'prettier/standalone'
import * as babelPlugin from 'prettier/plugins/babel'
import * as estreePlugin from 'prettier/plugins/estree'

/** Pretty-prints a raw response. The json5 parser keeps unquoted keys and hex literals as written. */
export function formatResponse(text: string): Promise<string> {
  return prettier.format(text, {
    parser: 'json5',
    plugins: [babelPlugin, estreePlugin],
    printWidth: 100,
    tabWidth: 2,
  })
}
