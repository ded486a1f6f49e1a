/**
 * Terminal demo: highlight a Python file, edit it, print it again.
 *
 * Run with: npm run demo [-- path/to/file.py]
 */

import { readFile } from "node:fs/promises";
import { loadHighlightConfig } from "../src/highlight/grammar.ts";
import { createHighlightedBuffer } from "../src/highlight/highlighted-buffer.ts";
import { BACKGROUND } from "../src/highlight/theme.ts";
import { hexToRgb, renderAnsi } from "../src/renderer/ansi.ts";

const path = process.argv[2] ?? new URL("./fixtures/sample.py", import.meta.url);
const source = await readFile(path, "utf8");

const config = await loadHighlightConfig();
const buffer = createHighlightedBuffer(config, source);

const bg = hexToRgb(BACKGROUND);
const print = (title: string) => {
  console.log(`--- ${title} (v${buffer.version}, ${buffer.spans().length} spans) ---`);
  const body = renderAnsi(buffer.currentText(), buffer.spans());
  console.log(bg ? `\x1b[48;2;${bg[0]};${bg[1]};${bg[2]}m${body}\x1b[0m` : body);
};

print("initial");

buffer.onChange(({ version }) => {
  console.log(`edit applied, now at version ${version}`);
});

const result = buffer.insert(0, "# edited\nTIMEOUT = 30\n");
if (!result.ok) {
  console.error(`${result.error.kind}: ${result.error.message}`);
  process.exitCode = 1;
} else {
  print("after inserting a header");
}

buffer.dispose();
