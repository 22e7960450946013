// Ensure React testing utilities run without extra warnings
globalThis.IS_REACT_ACT_ENVIRONMENT = true;
