/**
 * Single-leg order as sent to the exchange
 */
export interface OrderRequest {
    symbol: string;
    isBuy: boolean;
    size: number;
    limitPrice: number;
    timeInForce: 'Ioc';
    reduceOnly: boolean;
}

export interface FilledStatus {
    filled: {
        totalSz: string;
        avgPx: string;
        oid: number;
        fee?: string;
    };
}

export interface ErrorStatus {
    error: string;
}

export type OrderStatus = FilledStatus | ErrorStatus | Record<string, unknown>;

/**
 * Exchange order reply. On failure `response` is a plain message.
 */
export interface OrderResponse {
    status: 'ok' | 'err' | string;
    response:
        | {
              type: string;
              data?: {
                  statuses: OrderStatus[];
              };
          }
        | string;
}

/**
 * Places individual leg orders. Implementations must not reject for
 * exchange-side failures; those come back as a non-ok response.
 */
export interface ExecutionGateway {
    readonly name: string;
    order(request: OrderRequest): Promise<OrderResponse>;
}

export type Fill =
    | {
          success: true;
          size: number;
          price: number;
          fee: number;
          orderId: string;
      }
    | {
          success: false;
          error: string;
      };
