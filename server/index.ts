import { main } from "./cli";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[Main] Error:", error);
    process.exitCode = 1;
  });
