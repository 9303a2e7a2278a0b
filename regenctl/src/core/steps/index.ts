import type { StepTable } from "./context.js";
import { runCheckoutMain, runCheckoutUpstream } from "./checkout.js";
import { runProvision } from "./provision.js";
import { runInstall } from "./install.js";
import { runGenerate } from "./generate.js";
import { runCommit } from "./commit.js";

export const DEFAULT_STEPS: StepTable = {
  checkout_main: runCheckoutMain,
  checkout_upstream: runCheckoutUpstream,
  provision: runProvision,
  install: runInstall,
  generate: runGenerate,
  commit: runCommit,
};
