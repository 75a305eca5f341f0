#!/usr/bin/env node
import Pastel from 'pastel';

const app = new Pastel({
  importMeta: import.meta,
  name: 'reboot-to',
  description: `Terminal UI for rebooting into another UEFI boot entry.

Without options, pick an entry from a list: Enter reboots into it, n only sets it as the next (one-time) boot target.

<DEST> is either a number or text. Numbers are matched against boot entry IDs (see --list, or run efibootmgr without arguments). Text is matched case-sensitively against the start of entry names: "ub" matches "ubuntu", but neither "Ub" nor "bun" do.

Runs the efibootmgr and shutdown commands, which must be on PATH; run with sufficient permissions.`,
});

await app.run();
