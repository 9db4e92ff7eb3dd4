import { createProgram } from "./program.js";

createProgram().parse();
