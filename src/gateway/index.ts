export { SimulatedGateway } from "./simulated-gateway";
export type { SimulatedGatewayConfig, SimulatedGatewayEvents } from "./simulated-gateway";
export { LiveGateway, signQuery, toExchangeParams } from "./live-gateway";
export type { LiveGatewayConfig } from "./live-gateway";
export { createGateway, createSimulatedGateway, createLiveGateway } from "./gateway-factory";
export type { GatewayOverrides } from "./gateway-factory";
