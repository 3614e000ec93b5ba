// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * ragstore version.
 * Keep this in sync with package.json version.
 */
export const VERSION = '0.1.0';
