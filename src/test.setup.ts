// Shared test setup for Vitest
// Lets react-dom know it runs under act() so state updates flush synchronously in jsdom
// See: https://react.dev/reference/react/act
declare global {
  // eslint-disable-next-line no-var
  var IS_REACT_ACT_ENVIRONMENT: boolean | undefined;
}

globalThis.IS_REACT_ACT_ENVIRONMENT = true;

export {};
