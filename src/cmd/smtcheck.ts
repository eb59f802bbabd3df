#!/usr/bin/env node

//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import * as FS from "fs";

import chalk from "chalk";
import * as Commander from "commander";

import { SMTExpression } from "../tooling/smtlib/smt_exp";
import { SMTCheckResult, SMTLib2Interface } from "../tooling/smtlib/smt_dispatch";
import { SMTSolverChoice } from "../tooling/smtlib/smt_options";
import { SMTSolverCommand } from "../tooling/smtlib/smt_solver_command";
import { replaySMTLib2Script } from "../tooling/smtlib/smt_replay";

type SMTCheckCmdOptions = {
    z3?: boolean,
    cvc4?: boolean,
    timeout?: string,
    eval?: string[],
    dump?: boolean,
    verbose?: boolean
};

function colorResult(result: SMTCheckResult): string {
    switch(result) {
        case SMTCheckResult.Satisfiable:
            return chalk.green(result);
        case SMTCheckResult.Unsatisfiable:
            return chalk.red(result);
        case SMTCheckResult.Unknown:
            return chalk.yellow(result);
        case SMTCheckResult.Conflicting:
            return chalk.magenta(result);
        case SMTCheckResult.Error:
            return chalk.red.bold(result);
    }
}

function loadEvalExpressions(session: SMTLib2Interface, names: string[]): SMTExpression[] {
    return names.map((name) => {
        const sort = session.declaredSort(name);
        if(sort === undefined || (sort.kind !== "int" && sort.kind !== "bool")) {
            throw new Error(`Can only evaluate declared Int or Bool symbols -- ${name}`);
        }

        return SMTExpression.makeConst(`|${name}|`, sort);
    });
}

function runCheck(file: string, opts: SMTCheckCmdOptions): number {
    let timeout: number | undefined = undefined;
    if(opts.timeout !== undefined) {
        timeout = Number.parseInt(opts.timeout);
        if(!Number.isInteger(timeout) || timeout <= 0) {
            process.stderr.write(chalk.red(`Invalid timeout ${opts.timeout}\n`));
            return 1;
        }
    }

    const enabled = (opts.z3 || opts.cvc4) ? { z3: opts.z3 === true, cvc4: opts.cvc4 === true } : SMTSolverChoice.all();
    const session = new SMTLib2Interface(new SMTSolverCommand().solver(), { enabledSolvers: enabled, queryTimeout: timeout, verbose: opts.verbose === true });

    let evalexps: SMTExpression[] = [];
    try {
        const contents = FS.readFileSync(file).toString();
        const ccount = replaySMTLib2Script(contents, session);
        if(opts.verbose) {
            process.stderr.write(`Loaded ${ccount} commands from ${file}\n`);
        }

        evalexps = loadEvalExpressions(session, opts.eval ?? []);
    }
    catch(ex) {
        process.stderr.write(chalk.red(`Could not load ${file} -- ${ex}\n`));
        return 1;
    }

    if(opts.dump) {
        process.stdout.write(session.dumpQuery(evalexps));
        return 0;
    }

    const { result, values } = session.check(evalexps);
    process.stdout.write(colorResult(result) + "\n");
    for(let i = 0; i < values.length && i < evalexps.length; ++i) {
        process.stdout.write(`${opts.eval !== undefined ? opts.eval[i] : i} = ${values[i]}\n`);
    }

    return (result === SMTCheckResult.Satisfiable || result === SMTCheckResult.Unsatisfiable) ? 0 : 1;
}

const program = new Commander.Command();

program
    .name("smtcheck")
    .description("Check an SMT-LIB2 script against one or more solvers and report disagreements")
    .argument("<file>", "SMT-LIB2 script with declarations and assertions")
    .option("--z3", "Use z3")
    .option("--cvc4", "Use cvc4")
    .option("-t --timeout <ms>", "Timeout hint written into the script")
    .option("-e --eval <names...>", "Declared Int/Bool symbols to get values for")
    .option("-d --dump", "Print the query instead of running it", false)
    .option("-v --verbose", "Report solver failures", false)
    .action((file: string, opts: SMTCheckCmdOptions) => {
        process.exitCode = runCheck(file, opts);
    });

program.parse(process.argv);
