#!/usr/bin/env node
import { Cli } from "clipanion";
import { createCli } from "./index.js";

const [, , ...args] = process.argv;

void createCli().runExit(args, Cli.defaultContext);
