import { main } from "./lib/cli";

process.exitCode = await main(process.argv.slice(2));
