// Mock implementations
export * from './mocks/transport.mock';
export * from './mocks/channel-factory.mock';
export * from './mocks/proxy-socket.mock';
