#!/usr/bin/env node
/**
 * main.ts
 *
 * CLI entry point:
 * - opens Banner in a headed Chromium window
 * - waits while you log in manually (GT SSO/Duo) and open Enter CRNs
 * - registers the CRNs once, or camps until a seat opens (Ctrl+C stops)
 * - prints one line per CRN; exits non-zero if the page wasn't in the expected state
 */

import 'dotenv/config';
import { chromium, type Browser, type LaunchOptions } from '@playwright/test';
import { BannerRegistrationPage } from './banner';
import { browserLaunchOptions } from './browser';
import { campForSeat } from './camp';
import { type Ask, CRN_PROMPT, parseRegisterArgs, presetCrns, resolveMode, USAGE } from './cli';
import { loadConfig } from './config';
import { parseCrnInput, partitionCrns } from './crns';
import { ask } from './io';
import { Logger, LogLevel } from './logger';
import { exitCodeFor, formatAttempt, formatRun } from './report';
import { runRegistration } from './run';
import type { RegistrationRun } from './types';

function print(lines: string[]) {
  for (const line of lines) console.log(line);
}

export interface MainDeps {
  launch: (options: LaunchOptions) => Promise<Browser>;
  ask: Ask;
}

const defaultDeps: MainDeps = {
  launch: (options) => chromium.launch(options),
  ask,
};

// A run with nothing to submit, or null when at least one CRN is well-formed
function nothingToSubmit(crns: readonly string[]): RegistrationRun | null {
  const { valid, invalid } = partitionCrns(crns);
  return valid.length === 0 ? { results: [], invalid, fatal: null } : null;
}

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  deps: MainDeps = defaultDeps,
): Promise<number> {
  const args = parseRegisterArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.debug) Logger.setLevel(LogLevel.DEBUG);

  const cfg = loadConfig(process.env);

  // CRNs known before login are checked before Chromium opens
  const preset = await presetCrns(args, process.env);
  const unusable = preset && nothingToSubmit(preset);
  if (unusable) {
    print(formatRun(unusable));
    return exitCodeFor(unusable);
  }

  const browser = await deps.launch(browserLaunchOptions(cfg));

  try {
    const context = await browser.newContext({ viewport: null });
    const page = await context.newPage();
    await page.goto(cfg.registerUrl, { waitUntil: 'domcontentloaded' });

    console.log('\n1) Chromium opened.');
    console.log('2) Log in manually (GT SSO/Duo) and navigate to:');
    console.log('   Register for Classes → Enter CRNs\n');
    if (!args.yes) await deps.ask("Press Enter here once you're on the Enter CRNs screen...");

    const crns = preset ?? parseCrnInput(await deps.ask(CRN_PROMPT));
    const empty = nothingToSubmit(crns);
    if (empty) {
      print(formatRun(empty));
      return exitCodeFor(empty);
    }

    const mode = await resolveMode(args, process.env, deps.ask);
    const registration = new BannerRegistrationPage(page, cfg);

    let run: RegistrationRun;
    if (mode === 'once') {
      run = await runRegistration(registration, crns, cfg);
    } else {
      const controller = new AbortController();
      const onSigint = () => {
        console.log('\nStopped by user (Ctrl+C).');
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      console.log('\n⏳ Camping for seat. Press Ctrl+C to stop.\n');
      try {
        const camp = await campForSeat(registration, crns, cfg, {
          signal: controller.signal,
          onAttempt: (attempt, attemptRun) => print(formatAttempt(attempt, attemptRun)),
        });
        Logger.info(`Camping stopped (${camp.stoppedBy}) after ${camp.attempts} attempt(s)`);
        run = camp;
      } finally {
        process.off('SIGINT', onSigint);
      }
    }

    console.log('\nResult:');
    print(formatRun(run));

    if (!args.yes) await deps.ask('\nDone. Press Enter to quit...');
    return exitCodeFor(run);
  } finally {
    await browser.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      Logger.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
