#!/usr/bin/env tsx

import { runProbe } from '../../plugins/vcenter/index';

const controller = new AbortController();

function onSignal(signal: NodeJS.Signals) {
  controller.abort(new Error(`received ${signal}`));
}

process.once('SIGINT', onSignal);
process.once('SIGTERM', onSignal);

try {
  process.exitCode = await runProbe({ signal: controller.signal });
} finally {
  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);
}
