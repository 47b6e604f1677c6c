#!/usr/bin/env node
import { main } from "./CtxaskEntrypoint.js";

void main();
