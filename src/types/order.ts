// src/types/order.ts

export const PRODUCT_SLOTS = [1, 2, 3, 4, 5] as const;
export type ProductSlot = (typeof PRODUCT_SLOTS)[number];

export type ProductColumn =
  | `product_${ProductSlot}_name`
  | `product_${ProductSlot}_price`
  | `product_${ProductSlot}_quantity`;

export type CustomerColumn =
  | 'customer_email'
  | 'customer_first_name'
  | 'customer_last_name';

export type ShippingColumn =
  | 'shipping_address1'
  | 'shipping_city'
  | 'shipping_state'
  | 'shipping_country'
  | 'shipping_zip';

export type OrderColumn =
  | CustomerColumn
  | ShippingColumn
  | 'payment_method'
  | ProductColumn;

export const ORDER_COLUMNS: readonly OrderColumn[] = [
  'customer_email',
  'customer_first_name',
  'customer_last_name',
  'shipping_address1',
  'shipping_city',
  'shipping_state',
  'shipping_country',
  'shipping_zip',
  'payment_method',
  ...PRODUCT_SLOTS.flatMap(
    (slot): ProductColumn[] => [
      `product_${slot}_name` as const,
      `product_${slot}_price` as const,
      `product_${slot}_quantity` as const
    ]
  )
];

/**
 * One CSV row, keyed by the known column names.
 * The reader always fills every column; tests and other callers may omit some.
 */
export type RawRecord = Partial<Record<OrderColumn, string>>;

export type FinancialStatus = 'unpaid' | 'paid';

export interface OrderCustomer {
  email: string;
  first_name: string;
  last_name: string;
}

export interface OrderShippingAddress {
  address1: string;
  city: string;
  province: string;
  country: string;
  zip: string;
}

export interface OrderLineItem {
  title: string;
  price: string;
  quantity: number;
  requires_shipping: true;
  taxable: true;
}

export interface OrderPayload {
  customer: OrderCustomer;
  shipping_address: OrderShippingAddress;
  line_items: OrderLineItem[];
  financial_status: FinancialStatus;
  fulfillment_status: 'unshipped';
  send_receipt: true;
}

export interface SubmissionOutcome {
  ok: boolean;
  /** HTTP status, or null when the request never got a response. */
  status: number | null;
  message: string;
}
