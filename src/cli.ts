#!/usr/bin/env -S npx tsx

import { HELP, resolveCommand } from "./args";
import { generateSite } from "./site";

async function main() {
  const command = await resolveCommand(process.argv.slice(2), process.cwd());

  if (command.type === "help") {
    console.log(HELP);
    return;
  }

  const result = await generateSite(command.options);

  console.log(
    `Generated ${result.pages.length} pages and copied ${result.assets.length} files into ${command.options.output}`
  );
  if (result.warnings.length > 0) {
    console.warn(`${result.warnings.length} warning(s), rerun with --strict to fail on them`);
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
