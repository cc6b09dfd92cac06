// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export * from "./interfaces.js";
export * from "./errors.js";
export * from "./settings.js";
export * from "./textChunker.js";
export * from "./courseDocument.js";
export * from "./vector/vector.js";
export * from "./vector/embeddings.js";
export * from "./vector/vectorCollection.js";
export * from "./keyedLock.js";
export * from "./courseIndex.js";
export * from "./nameResolver.js";
export * from "./courseSearch.js";
export * from "./tools.js";
export * from "./sessionHistory.js";
export * from "./generation.js";
export * from "./prompts.js";
export * from "./courseAssistant.js";
