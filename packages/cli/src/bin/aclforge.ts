#!/usr/bin/env node
/**
 * bin/aclforge.ts: entry point for the `aclforge` CLI command.
 *
 * aclforge render policy.json            → document on stdout
 * aclforge render policy.json -o acl.txt → document written to acl.txt
 */

const { program } = await import('../commands/index.js')
program.parse()
