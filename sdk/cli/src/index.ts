#!/usr/bin/env node
import yargs, { type Argv } from "yargs";
import { hideBin } from "yargs/helpers";
import { globalOptions, type GlobalArgs } from "./config";
import { reportError } from "./runner";

import * as init from "./commands/init";
import * as mint from "./commands/mint";
import * as multisend from "./commands/multisend";
import * as transfer from "./commands/transfer";
import * as approve from "./commands/approve";
import * as pause from "./commands/pause";
import * as ownership from "./commands/ownership";
import * as balance from "./commands/balance";
import * as status from "./commands/status";

const cli: Argv<GlobalArgs> = yargs(hideBin(process.argv))
  .scriptName("capped-token")
  .usage("$0 <command> [options]")
  .option("keypair", globalOptions.keypair)
  .option("db", globalOptions.db);

cli
  .command(init)
  .command(mint)
  .command(multisend)
  .command(transfer)
  .command(approve)
  .command(pause)
  .command(ownership)
  .command(balance)
  .command(status)
  .demandCommand(1, "Specify a command to run")
  .strict()
  .fail((msg, err, y) => {
    if (err) throw err;
    y.showHelp();
    console.error(`\n${msg}`);
    process.exit(1);
  })
  .help()
  .parseAsync()
  .catch(reportError);
