import { createProgram } from "./program.js";

async function main() {
  await createProgram().parseAsync(process.argv);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
