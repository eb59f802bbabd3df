//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import assert from "assert";
import chalk from "chalk";

import { SMTExpression } from "./smt_exp";
import { SMTLib2Encoder } from "./smt_encoder";
import { SMT_QUERY_KIND, SMTSolverOptions, enabledSolverCommands } from "./smt_options";

enum SMTCheckResult {
    Satisfiable = "sat",
    Unsatisfiable = "unsat",
    Unknown = "unknown",
    Conflicting = "conflicting",
    Error = "error"
}

type SMTCallbackResult = {
    success: boolean,
    responseOrErrorMessage: string
};

type SMTQueryCallback = (kind: string, query: string) => SMTCallbackResult;

const EVAL_EXPR_PREFIX = "EVALEXPR_";

function resultFromSolverResponse(response: string): SMTCheckResult {
    if(response.startsWith("sat")) {
        return SMTCheckResult.Satisfiable;
    }
    else if(response.startsWith("unsat")) {
        return SMTCheckResult.Unsatisfiable;
    }
    else if(response.startsWith("unknown")) {
        return SMTCheckResult.Unknown;
    }
    else {
        return SMTCheckResult.Error;
    }
}

function solverAnswered(result: SMTCheckResult): boolean {
    return result === SMTCheckResult.Satisfiable || result === SMTCheckResult.Unsatisfiable;
}

//
//Lexical scan of a get-value reply -- takes the token after the first space of each "(name value)" pair.
//Values that are themselves parenthesized (tuples, negative literals printed as (- 5)) are not handled.
//
function parseValues(response: string): string[] {
    const nl = response.indexOf("\n");
    if(nl === -1) {
        return [];
    }

    let values: string[] = [];
    let start = response.indexOf("(", nl);
    while(start !== -1) {
        let valstart = response.indexOf(" ", start);
        if(valstart === -1) {
            break;
        }
        valstart++;

        let valend = response.indexOf(")", valstart);
        if(valend === -1) {
            valend = response.length;
        }

        values.push(response.slice(valstart, valend));
        start = response.indexOf("(", valend);
    }

    return values;
}

class SMTLib2Interface extends SMTLib2Encoder {
    private readonly smtCallback: SMTQueryCallback;
    private readonly options: SMTSolverOptions;

    private unhandled: string[] = [];

    constructor(smtCallback: SMTQueryCallback, options: SMTSolverOptions) {
        super(options.queryTimeout);

        this.smtCallback = smtCallback;
        this.options = options;
    }

    get unhandledQueries(): readonly string[] {
        return this.unhandled;
    }

    check(expressionsToEvaluate: SMTExpression[]): { result: SMTCheckResult, values: string[] } {
        const query = this.dumpQuery(expressionsToEvaluate);

        let lastResult = SMTCheckResult.Error;
        let finalValues: string[] = [];
        for(const solver of enabledSolverCommands(this.options.enabledSolvers)) {
            const response = this.querySolver(solver, query);
            if(response === undefined) {
                continue;
            }

            const result = resultFromSolverResponse(response);
            if(solverAnswered(result)) {
                if(!solverAnswered(lastResult)) {
                    lastResult = result;
                    if(result === SMTCheckResult.Satisfiable) {
                        finalValues = parseValues(response);
                    }
                }
                else if(lastResult !== result) {
                    this.logWarning(`Solver ${solver} answered ${result} but an earlier solver answered ${lastResult}`);

                    lastResult = SMTCheckResult.Conflicting;
                    break;
                }
            }
            else if(result === SMTCheckResult.Unknown) {
                if(lastResult === SMTCheckResult.Error) {
                    lastResult = result;
                }
            }
            else {
                this.logWarning(`Solver ${solver} gave an unrecognized reply -- ${response.split("\n")[0]}`);
            }
        }

        if(lastResult === SMTCheckResult.Error) {
            if(this.options.verbose) {
                process.stderr.write(chalk.red(`No usable answer from any solver, query recorded (${this.unhandled.length + 1} unhandled)\n`));
            }
            this.unhandled.push(query);
        }

        return { result: lastResult, values: finalValues };
    }

    dumpQuery(expressionsToEvaluate: SMTExpression[]): string {
        return this.fullScript() + this.checkSatAndGetValuesCommand(expressionsToEvaluate);
    }

    checkSatAndGetValuesCommand(expressionsToEvaluate: SMTExpression[]): string {
        if(expressionsToEvaluate.length === 0) {
            return "(check-sat)\n";
        }

        //TODO: the EVALEXPR_ names are not checked against user declarations
        let command = "";
        for(let i = 0; i < expressionsToEvaluate.length; ++i) {
            const exp = expressionsToEvaluate[i];
            assert(exp.sort !== undefined && (exp.sort.kind === "int" || exp.sort.kind === "bool"), "Invalid sort for expression to evaluate");

            command += `(declare-const |${EVAL_EXPR_PREFIX}${i}| ${exp.sort.kind === "int" ? "Int" : "Bool"})\n`;
            command += `(assert (= |${EVAL_EXPR_PREFIX}${i}| ${this.toSExpr(exp)}))\n`;
        }

        command += "(check-sat)\n";
        command += `(get-value (${expressionsToEvaluate.map((_, i) => `|${EVAL_EXPR_PREFIX}${i}| `).join("")}))\n`;

        return command;
    }

    private querySolver(solver: string, query: string): string | undefined {
        let cbresult: SMTCallbackResult;
        try {
            cbresult = this.smtCallback(`${SMT_QUERY_KIND} ${solver}`, query);
        }
        catch(ex) {
            this.logWarning(`Solver ${solver} failed -- ${ex}`);
            return undefined;
        }

        if(!cbresult.success) {
            this.logWarning(`Solver ${solver} unavailable -- ${cbresult.responseOrErrorMessage}`);
            return undefined;
        }

        return cbresult.responseOrErrorMessage;
    }

    private logWarning(msg: string): void {
        if(this.options.verbose) {
            process.stderr.write(chalk.yellow(msg + "\n"));
        }
    }
}

export {
    SMTCheckResult, SMTCallbackResult, SMTQueryCallback,
    EVAL_EXPR_PREFIX,
    resultFromSolverResponse, parseValues,
    SMTLib2Interface
};
