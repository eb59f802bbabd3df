//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

export * from "./smt_exp";
export * from "./smt_options";
export * from "./smt_encoder";
export * from "./smt_dispatch";
export * from "./smt_parser";
export * from "./smt_solver_command";
export * from "./smt_replay";
