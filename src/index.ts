#!/usr/bin/env node
import { zone } from './logging/zone';
import { EXIT_FATAL, startApp } from './app';
import { ConfigError } from './config';
import { SetupAbortedError } from './setup/steps';

const log = zone('index');

startApp()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        if (err instanceof SetupAbortedError || err instanceof ConfigError) {
            log.error({ message: err.message });
        } else {
            // Unexpected failures (templates, filesystem) keep their stack trace
            console.error(err);
        }
        process.exitCode = EXIT_FATAL;
    });
