#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { createCli } from "./commands";

createCli(hideBin(process.argv))
  .parseAsync()
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });
