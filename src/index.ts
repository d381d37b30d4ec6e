/**
 * portwatch — port change monitor
 *
 * CLI エントリポイント。
 */

import { main } from './cli.js';

const code = await main(process.argv);
if (code !== 0) {
  process.exit(code);
}
