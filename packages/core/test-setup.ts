/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Debug output is configured per test; a developer's shell must not turn it on
for (const name of [
  'DEBUG',
  'INCIDENT_DEBUG',
  'INCIDENT_DEBUG_LEVEL',
  'INCIDENT_DEBUG_OUTPUT',
]) {
  delete process.env[name];
}
