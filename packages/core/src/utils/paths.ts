/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Per-user and per-project settings directory name. */
export const APP_DIR = '.incident-agent';

/** Namespace prefix shared by every logger in the package. */
export const LOG_NAMESPACE_PREFIX = 'incident';
