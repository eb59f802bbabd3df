//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import assert from "assert";

class SMTParsingError extends Error {
    constructor(msg: string) {
        super(msg);

        this.name = "SMTParsingError";
    }
}

class SMTLib2Expression {
    readonly data: string | SMTLib2Expression[];

    constructor(data: string | SMTLib2Expression[]) {
        this.data = data;
    }

    isAtom(): boolean {
        return typeof(this.data) === "string";
    }

    toString(): string {
        if(typeof(this.data) === "string") {
            return this.data;
        }
        else {
            return `(${this.data.map((sexp) => sexp.toString()).join(" ")})`;
        }
    }
}

//
//A source handing out one character per call, undefined once the input is finished.
//May throw if the underlying input breaks -- the parser reports that as an SMTParsingError.
//
interface SMTInputSource {
    next(): string | undefined;
}

class StringInputSource implements SMTInputSource {
    private readonly contents: string;
    private pos: number = 0;

    constructor(contents: string) {
        this.contents = contents;
    }

    next(): string | undefined {
        if(this.pos >= this.contents.length) {
            return undefined;
        }

        return this.contents[this.pos++];
    }
}

const EOF_TOKEN = "\0";

function isWhiteSpace(c: string): boolean {
    return c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\f" || c === "\v";
}

class SMTLib2Parser {
    private readonly input: SMTInputSource;
    private exhausted: boolean = false;

    //starts as a synthetic space so nothing is read until the first parse call
    private token: string = " ";

    constructor(input: SMTInputSource) {
        this.input = input;
    }

    isEOF(): boolean {
        this.skipWhitespace();
        return this.peek() === EOF_TOKEN;
    }

    parseExpression(): SMTLib2Expression {
        this.skipWhitespace();
        if(this.peek() === EOF_TOKEN) {
            //callers check isEOF first, so this is a truncated reply
            this.advance();
        }

        if(this.peek() === "(") {
            this.advance();
            this.skipWhitespace();

            let subexps: SMTLib2Expression[] = [];
            while(this.peek() !== EOF_TOKEN && this.peek() !== ")") {
                subexps.push(this.parseExpression());
                this.skipWhitespace();
            }
            assert(this.peek() === ")", "Unbalanced parenthesis in solver output");

            //the next character may not be available yet on an interactive source so do not read it
            this.token = " ";
            return new SMTLib2Expression(subexps);
        }
        else {
            return new SMTLib2Expression(this.parseToken());
        }
    }

    private parseToken(): string {
        let result = "";

        this.skipWhitespace();
        const ispipe = this.peek() === "|";
        if(ispipe) {
            this.advance();
        }

        let closed = false;
        while(this.peek() !== EOF_TOKEN) {
            const c = this.peek();
            if(ispipe && c === "|") {
                this.advance();
                closed = true;
                break;
            }
            else if(!ispipe && (isWhiteSpace(c) || c === "(" || c === ")")) {
                break;
            }
            else {
                result += c;
                this.advance();
            }
        }

        if(ispipe && !closed) {
            throw new SMTParsingError(`Unterminated quoted symbol |${result}`);
        }

        return result;
    }

    private readChar(): string {
        if(this.exhausted) {
            throw new SMTParsingError("Read past the end of the input");
        }

        let c: string | undefined;
        try {
            c = this.input.next();
        }
        catch(ex) {
            throw new SMTParsingError(`Input became unreadable -- ${ex}`);
        }

        if(c === undefined) {
            this.exhausted = true;
            return EOF_TOKEN;
        }

        return c;
    }

    private advance(): void {
        let c = this.readChar();
        if(c === ";") {
            while(c !== "\n" && c !== EOF_TOKEN) {
                c = this.readChar();
            }
        }

        this.token = c;
    }

    private peek(): string {
        return this.token;
    }

    private skipWhitespace(): void {
        while(isWhiteSpace(this.peek())) {
            this.advance();
        }
    }
}

function parseSMTLib2(contents: string): SMTLib2Expression[] {
    const parser = new SMTLib2Parser(new StringInputSource(contents));

    let exps: SMTLib2Expression[] = [];
    while(!parser.isEOF()) {
        exps.push(parser.parseExpression());
    }

    return exps;
}

export {
    SMTParsingError,
    SMTLib2Expression, SMTInputSource, StringInputSource,
    SMTLib2Parser, parseSMTLib2
};
