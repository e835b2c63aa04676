export { handler, __setAppContextFactory, type AppContext } from './handler';
export * from './env';
export { createLocalServer, startLocalServer } from './local-server';
