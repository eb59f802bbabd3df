//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { SMTArraySort, SMTBitVectorSort, SMTBoolSort, SMTExpression, SMTFunctionSort, SMTIntSort, SMTSort } from "./smt_exp";
import { SMTLib2Encoder } from "./smt_encoder";
import { SMTLib2Expression, parseSMTLib2 } from "./smt_parser";

class SMTReplayError extends Error {
    constructor(msg: string) {
        super(msg);

        this.name = "SMTReplayError";
    }
}

//Commands the session regenerates on its own (preamble and check tail)
const SKIPPED_COMMANDS = ["set-option", "set-logic", "set-info", "check-sat", "get-value", "get-model", "exit"];

function atomOf(sexp: SMTLib2Expression): string | undefined {
    return typeof(sexp.data) === "string" ? sexp.data : undefined;
}

function convertSort(sexp: SMTLib2Expression): SMTSort {
    if(typeof(sexp.data) === "string") {
        if(sexp.data === "Int") {
            return new SMTIntSort(true);
        }
        else if(sexp.data === "Bool") {
            return new SMTBoolSort();
        }
        else {
            throw new SMTReplayError(`Unsupported sort ${sexp.data}`);
        }
    }

    const parts = sexp.data;
    if(parts.length === 3 && atomOf(parts[0]) === "_" && atomOf(parts[1]) === "BitVec") {
        const width = Number.parseInt(parts[2].toString());
        if(!Number.isInteger(width) || width <= 0) {
            throw new SMTReplayError(`Invalid bitvector width in ${sexp.toString()}`);
        }

        return new SMTBitVectorSort(width);
    }
    else if(parts.length === 3 && atomOf(parts[0]) === "Array") {
        return new SMTArraySort(convertSort(parts[1]), convertSort(parts[2]));
    }
    else {
        throw new SMTReplayError(`Unsupported sort ${sexp.toString()}`);
    }
}

const SIMPLE_SYMBOL_RE = /^[A-Za-z~!@$%^&*_\-+=<>.?\/][A-Za-z0-9~!@$%^&*_\-+=<>.?\/]*$/;
const LITERAL_RE = /^([0-9]+(\.[0-9]+)?|#x[0-9A-Fa-f]+|#b[01]+)$/;

function quoteAtom(atom: string, encoder: SMTLib2Encoder): string {
    if(encoder.isDeclared(atom) || !(SIMPLE_SYMBOL_RE.test(atom) || LITERAL_RE.test(atom))) {
        return `|${atom}|`;
    }

    return atom;
}

function convertTerm(sexp: SMTLib2Expression, encoder: SMTLib2Encoder): SMTExpression {
    if(typeof(sexp.data) === "string") {
        //the parser strips |..| so declared names and anything that is not a plain symbol or literal get it back
        return SMTExpression.makeConst(quoteAtom(sexp.data, encoder), encoder.declaredSort(sexp.data));
    }

    const parts = sexp.data;
    if(parts.length === 0) {
        throw new SMTReplayError("Empty application");
    }

    //indexed operators such as (_ extract 3 0) and qualified ones such as (as const ...) are kept verbatim
    const op = parts[0];
    const opname = typeof(op.data) === "string" ? convertTerm(op, encoder).name : op.toString();

    const fsort = typeof(op.data) === "string" ? encoder.declaredSort(op.data) : undefined;
    const rsort = (fsort !== undefined && fsort.kind === "function") ? fsort.codomain : undefined;

    return SMTExpression.makeCall(opname, parts.slice(1).map((arg) => convertTerm(arg, encoder)), rsort);
}

function replayCommand(cmd: SMTLib2Expression, encoder: SMTLib2Encoder): void {
    if(typeof(cmd.data) === "string" || cmd.data.length === 0) {
        throw new SMTReplayError(`Expected a command but found ${cmd.toString()}`);
    }

    const parts = cmd.data;
    const cname = atomOf(parts[0]);
    if(cname === undefined) {
        throw new SMTReplayError(`Expected a command name in ${cmd.toString()}`);
    }

    if(SKIPPED_COMMANDS.includes(cname)) {
        return;
    }

    if(cname === "declare-const") {
        const vname = parts.length === 3 ? atomOf(parts[1]) : undefined;
        if(vname === undefined) {
            throw new SMTReplayError(`Malformed declaration ${cmd.toString()}`);
        }

        encoder.declareVariable(vname, convertSort(parts[2]));
    }
    else if(cname === "declare-fun") {
        const vname = parts.length === 4 ? atomOf(parts[1]) : undefined;
        const domain = parts.length === 4 ? parts[2].data : undefined;
        if(vname === undefined || domain === undefined || typeof(domain) === "string") {
            throw new SMTReplayError(`Malformed declaration ${cmd.toString()}`);
        }

        const codomain = convertSort(parts[3]);
        if(domain.length === 0) {
            encoder.declareVariable(vname, codomain);
        }
        else {
            encoder.declareFunction(vname, new SMTFunctionSort(domain.map((dsexp) => convertSort(dsexp)), codomain));
        }
    }
    else if(cname === "assert") {
        if(parts.length !== 2) {
            throw new SMTReplayError(`Malformed assertion ${cmd.toString()}`);
        }

        encoder.addAssertion(convertTerm(parts[1], encoder));
    }
    else if(cname === "push" || cname === "pop") {
        const count = parts.length === 1 ? 1 : Number.parseInt(parts[1].toString());
        if(!Number.isInteger(count) || count < 0) {
            throw new SMTReplayError(`Malformed scope command ${cmd.toString()}`);
        }

        for(let i = 0; i < count; ++i) {
            if(cname === "push") {
                encoder.push();
            }
            else {
                if(encoder.scopeDepth === 1) {
                    throw new SMTReplayError(`Script pops more scopes than it pushed`);
                }
                encoder.pop();
            }
        }
    }
    else {
        throw new SMTReplayError(`Unsupported command ${cname}`);
    }
}

//Feed a stored script (e.g. the output of dumpQuery) back into a session
function replaySMTLib2Script(contents: string, encoder: SMTLib2Encoder): number {
    const cmds = parseSMTLib2(contents);
    cmds.forEach((cmd) => replayCommand(cmd, encoder));

    return cmds.length;
}

export {
    SMTReplayError,
    convertSort, convertTerm,
    replaySMTLib2Script
};
