#!/usr/bin/env node
import { actionFactories } from './actions';

function usage() {
  console.log(`
usage: bif6-tools inspect <bif6 file> [--max-dimension N]
       bif6-tools extract <bif6 file|directory|glob> <output directory> [--new-only] [--quiet] [--max-dimension N]
`.trim());
  return false;
}

async function main(args: string[]) {
  const actionFactory = actionFactories[args[0]];
  if (!actionFactory) {
    return usage();
  } else {
    return await (await actionFactory())(args.slice(1));
  }
}

main(process.argv.slice(2)).then((ok) => process.exitCode = ok ? 0 : 1).catch((err) => {
  console.error('\nunexpected error: ', err);
  process.exit(1);
});
