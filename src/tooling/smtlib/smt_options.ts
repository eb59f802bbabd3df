//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

type SMTSolverChoice = {
    z3: boolean,
    cvc4: boolean
};

const SMTSolverChoice = {
    all(): SMTSolverChoice {
        return { z3: true, cvc4: true };
    },

    none(): SMTSolverChoice {
        return { z3: false, cvc4: false };
    },

    z3(): SMTSolverChoice {
        return { z3: true, cvc4: false };
    },

    cvc4(): SMTSolverChoice {
        return { z3: false, cvc4: true };
    }
};

type SMTSolverOptions = {
    enabledSolvers: SMTSolverChoice,
    queryTimeout?: number, //milliseconds, emitted as a hint only
    verbose?: boolean
};

const Z3_SOLVER_COMMAND = "z3 rlimit=1000000";
const CVC4_SOLVER_COMMAND = "cvc4";

const SMT_QUERY_KIND = "smt-query";

function enabledSolverCommands(choice: SMTSolverChoice): string[] {
    let commands: string[] = [];
    if(choice.z3) {
        commands.push(Z3_SOLVER_COMMAND);
    }
    if(choice.cvc4) {
        commands.push(CVC4_SOLVER_COMMAND);
    }

    return commands;
}

export {
    SMTSolverChoice, SMTSolverOptions,
    Z3_SOLVER_COMMAND, CVC4_SOLVER_COMMAND, SMT_QUERY_KIND,
    enabledSolverCommands
};
