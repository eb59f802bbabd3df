//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import * as FS from "fs";
import * as OS from "os";
import * as Path from "path";
import { spawnSync } from "child_process";

import assert from "assert";

import { SMT_QUERY_KIND } from "./smt_options";
import { SMTCallbackResult, SMTQueryCallback } from "./smt_dispatch";

function parseSolverInvocation(kind: string): { binary: string, args: string[] } {
    const cmdline = kind.startsWith(SMT_QUERY_KIND + " ") ? kind.slice(SMT_QUERY_KIND.length + 1) : kind;
    const words = cmdline.split(" ").filter((w) => w !== "");
    assert(words.length !== 0, `No solver named in "${kind}"`);

    return { binary: words[0], args: words.slice(1) };
}

//Runs a solver binary found on the PATH; the command line is carried in the query kind string
class SMTSolverCommand {
    solve(kind: string, query: string): SMTCallbackResult {
        const { binary, args } = parseSolverInvocation(kind);

        let tmpdir: string | undefined = undefined;
        try {
            tmpdir = FS.mkdtempSync(Path.join(OS.tmpdir(), "smtquery-"));
            const queryfile = Path.join(tmpdir, "query.smt2");
            FS.writeFileSync(queryfile, query);

            //solvers exit non-zero when a trailing get-value has no model so the exit status is not consulted
            const proc = spawnSync(binary, [...args, queryfile], { encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"] });
            if(proc.error !== undefined) {
                return { success: false, responseOrErrorMessage: `Error running ${binary} -- ${proc.error.message}` };
            }

            if(proc.stdout === "") {
                return { success: false, responseOrErrorMessage: `No output from ${binary} -- ${proc.stderr}` };
            }

            return { success: true, responseOrErrorMessage: proc.stdout };
        }
        catch(ex) {
            return { success: false, responseOrErrorMessage: `Error running ${binary} -- ${ex}` };
        }
        finally {
            if(tmpdir !== undefined) {
                FS.rmSync(tmpdir, { recursive: true, force: true });
            }
        }
    }

    solver(): SMTQueryCallback {
        return (kind: string, query: string) => {
            assert(kind.startsWith(SMT_QUERY_KIND), `Unexpected query kind ${kind}`);
            return this.solve(kind, query);
        };
    }
}

export {
    parseSolverInvocation,
    SMTSolverCommand
};
