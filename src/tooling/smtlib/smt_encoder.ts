//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import assert from "assert";

import { SMTExpression, SMTSort, SMTTupleSort } from "./smt_exp";

class SMTLib2Encoder {
    private readonly queryTimeout: number | undefined;

    //one text buffer per push level, never empty
    private accumulatedOutput: string[] = [];
    private variables: Map<string, SMTSort> = new Map<string, SMTSort>();

    //keyed on the sort object itself -- structurally equal sorts built separately get separate entries
    private sortNames: Map<SMTSort, string> = new Map<SMTSort, string>();
    private userSorts: [string, string][] = [];

    constructor(queryTimeout: number | undefined) {
        this.queryTimeout = queryTimeout;

        this.reset();
    }

    reset(): void {
        this.accumulatedOutput = [""];
        this.variables.clear();
        this.userSorts = [];
        this.sortNames.clear();

        this.write("(set-option :produce-models true)");
        if(this.queryTimeout !== undefined) {
            this.write(`(set-option :timeout ${this.queryTimeout})`);
        }
        this.write("(set-logic ALL)");
    }

    get scopeDepth(): number {
        return this.accumulatedOutput.length;
    }

    push(): void {
        this.accumulatedOutput.push("");
    }

    pop(): void {
        assert(this.accumulatedOutput.length > 1, "Cannot pop the outermost scope");

        this.accumulatedOutput.pop();
    }

    isDeclared(name: string): boolean {
        return this.variables.has(name);
    }

    declaredSort(name: string): SMTSort | undefined {
        return this.variables.get(name);
    }

    declareVariable(name: string, sort: SMTSort): void {
        if(sort.kind === "function") {
            this.declareFunction(name, sort);
        }
        else if(!this.variables.has(name)) {
            this.variables.set(name, sort);
            this.write(`(declare-fun |${name}| () ${this.toSmtLibSort(sort)})`);
        }
    }

    declareFunction(name: string, sort: SMTSort): void {
        assert(sort.kind === "function", `Expected a function sort for ${name}`);

        //TODO: key on the domain and codomain as well so overloads with the same name are not dropped
        if(!this.variables.has(name)) {
            const domain = this.toSmtLibSortList(sort.domain);
            const codomain = this.toSmtLibSort(sort.codomain);

            this.variables.set(name, sort);
            this.write(`(declare-fun |${name}| ${domain} ${codomain})`);
        }
    }

    addAssertion(exp: SMTExpression): void {
        this.write(`(assert ${this.toSExpr(exp)})`);
    }

    fullScript(): string {
        return this.accumulatedOutput.join("\n");
    }

    toSExpr(exp: SMTExpression): string {
        if(exp.isLeaf()) {
            return exp.name;
        }

        if(exp.name === "int2bv") {
            assert(exp.args.length === 2, "int2bv takes a value and a width");

            const size = Number.parseInt(exp.args[1].name);
            assert(Number.isInteger(size) && size > 0, `Invalid int2bv width ${exp.args[1].name}`);

            const arg = this.toSExpr(exp.args[0]);
            const int2bv = `(_ int2bv ${size})`;

            //solvers treat every bitvector as unsigned so 2's complement is applied by hand
            return `(ite (>= ${arg} 0) (${int2bv} ${arg}) (bvneg (${int2bv} (- ${arg}))))`;
        }
        else if(exp.name === "bv2int") {
            assert(exp.args.length === 1, "bv2int takes a single argument");

            const intsort = exp.sort;
            assert(intsort !== undefined && intsort.kind === "int", "bv2int must produce an Int sort");

            const arg = this.toSExpr(exp.args[0]);
            const nat = `(bv2nat ${arg})`;
            if(!intsort.isSigned) {
                return nat;
            }

            const bvsort = exp.args[0].sort;
            assert(bvsort !== undefined && bvsort.kind === "bitvector", "bv2int argument must have a bitvector sort");

            const pos = bvsort.width - 1;
            return `(ite (= ((_ extract ${pos} ${pos}) ${arg}) #b0) ${nat} (- (bv2nat (bvneg ${arg}))))`;
        }
        else if(exp.name === "const_array") {
            assert(exp.args.length === 2, "const_array takes a sort placeholder and a fill value");

            const sortsort = exp.args[0].sort;
            assert(sortsort !== undefined && sortsort.kind === "sort", "const_array expects a sort placeholder");
            const arraysort = sortsort.inner;
            assert(arraysort.kind === "array", "const_array placeholder must wrap an Array sort");

            return `((as const ${this.toSmtLibSort(arraysort)}) ${this.toSExpr(exp.args[1])})`;
        }
        else if(exp.name === "tuple_get") {
            assert(exp.args.length === 2, "tuple_get takes a tuple and an index");

            const tuplesort = exp.args[0].sort;
            assert(tuplesort !== undefined && tuplesort.kind === "tuple", "tuple_get expects a tuple sorted argument");

            const index = Number.parseInt(exp.args[1].name);
            assert(Number.isInteger(index) && 0 <= index && index < tuplesort.members.length, `Tuple index ${exp.args[1].name} out of range for ${tuplesort.name}`);

            return `(|${tuplesort.members[index]}| ${this.toSExpr(exp.args[0])})`;
        }
        else if(exp.name === "tuple_constructor") {
            const tuplesort = exp.sort;
            assert(tuplesort !== undefined && tuplesort.kind === "tuple", "tuple_constructor must produce a tuple sort");

            return `(|${tuplesort.name}|${exp.args.map((arg) => " " + this.toSExpr(arg)).join("")})`;
        }
        else {
            return `(${exp.name}${exp.args.map((arg) => " " + this.toSExpr(arg)).join("")})`;
        }
    }

    toSmtLibSort(sort: SMTSort): string {
        const cached = this.sortNames.get(sort);
        if(cached !== undefined) {
            return cached;
        }

        const smtlibname = this.sortToString(sort);
        this.sortNames.set(sort, smtlibname);

        return smtlibname;
    }

    private toSmtLibSortList(sorts: readonly SMTSort[]): string {
        return `(${sorts.map((sort) => this.toSmtLibSort(sort) + " ").join("")})`;
    }

    private sortToString(sort: SMTSort): string {
        switch(sort.kind) {
            case "int":
                return "Int";
            case "bool":
                return "Bool";
            case "bitvector":
                return `(_ BitVec ${sort.width})`;
            case "array":
                return `(Array ${this.toSmtLibSort(sort.domain)} ${this.toSmtLibSort(sort.range)})`;
            case "tuple":
                return this.declareTupleSort(sort);
            case "function":
                return assert.fail("Function sorts are only rendered as part of a declaration");
            case "sort":
                return assert.fail("Sort placeholders have no SMT-LIB name");
        }
    }

    private declareTupleSort(sort: SMTTupleSort): string {
        const tuplename = `|${sort.name}|`;
        if(this.userSorts.find((entry) => entry[0] === tuplename) === undefined) {
            let decl = `(declare-datatypes ((${tuplename} 0)) (((${tuplename}`;
            for(let i = 0; i < sort.members.length; ++i) {
                decl += ` (|${sort.members[i]}| ${this.toSmtLibSort(sort.components[i])})`;
            }
            decl += "))))";

            this.userSorts.push([tuplename, decl]);
            this.write(decl);
        }

        return tuplename;
    }

    protected write(data: string): void {
        assert(this.accumulatedOutput.length !== 0, "No scope to write into");

        this.accumulatedOutput[this.accumulatedOutput.length - 1] += data + "\n";
    }
}

export {
    SMTLib2Encoder
};
