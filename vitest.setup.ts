// Lets react-dom know that state updates in component tests are wrapped in act().
Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true);
