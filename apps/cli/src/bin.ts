#!/usr/bin/env node
import { exec } from "./exec.js";

void exec();
