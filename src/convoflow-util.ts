/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

export * from "./convoflow-util-audio"
export * from "./convoflow-util-error"
export * from "./convoflow-util-queue"
export * from "./convoflow-util-misc"
export * from "./convoflow-util-text"
