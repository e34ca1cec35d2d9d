/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

import { defineConfig } from "vitest/config"

export default defineConfig({
    test: {
        include:     [ "test/**/*.test.ts" ],
        environment: "node",
        testTimeout: 10000
    }
})
