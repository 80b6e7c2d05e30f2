export * from './settings';
export * from './createKiln';

export * from '@kiln/core';
export * from '@kiln/runtime';
export { createGatewayApp, createGatewayApi } from '@kiln/api';
