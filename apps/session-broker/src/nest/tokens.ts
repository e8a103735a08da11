export const SESSION_BROKER_ROUTE_RUNTIME = Symbol('SESSION_BROKER_ROUTE_RUNTIME')
export const SESSION_BROKER_ROUTE_HANDLERS = Symbol('SESSION_BROKER_ROUTE_HANDLERS')
