// src/__tests__/fixtures/order-model.ts

import { ConstraintMapping } from '../../metadata/constraint-mapping.js';
import { arrayOf, bean, mapOf } from '../../metadata/type-descriptors.js';
import { min, notNull, size } from '../../constraints/builtin.js';
import type { GroupDefinitionsInput } from '../../core/groups/group-definitions.js';
import type { ConstraintViolation } from '../../core/violations.js';

export class Address {
  constructor(
    public street: string | null,
    public city: string | null
  ) {}
}

export class Customer {
  address: Address | null = null;
  friend: Customer | null = null;

  constructor(public name: string | null) {}
}

export class OrderLine {
  constructor(
    public sku: string | null,
    public quantity: number
  ) {}
}

export class Order {
  customer: Customer | null = null;
  lines: (OrderLine | null)[] = [];
  linesBySku = new Map<unknown, OrderLine>();

  constructor(public id: string | null) {}
}

/**
 * Default: Order.id, Customer.name, OrderLine.sku, OrderLine.quantity
 * Billing: Order.lines (at least one line)
 * Shipping: Address.street, Address.city
 * Checkout: sequence Default -> Billing -> Shipping
 */
export function createOrderMapping(): ConstraintMapping {
  const mapping = new ConstraintMapping();

  mapping.type(Order)
    .property('id', notNull())
    .property('lines', size({ min: 1 }), { groups: ['Billing'] })
    .cascade('customer', bean(Customer))
    .cascade('lines', arrayOf(OrderLine))
    .cascade('linesBySku', mapOf(OrderLine));

  mapping.type(Customer)
    .property('name', notNull())
    .cascade('address', bean(Address))
    .cascade('friend', bean(Customer));

  mapping.type(Address)
    .property('street', notNull(), { groups: ['Shipping'] })
    .property('city', notNull(), { groups: ['Shipping'] });

  mapping.type(OrderLine)
    .property('sku', notNull())
    .property('quantity', min(1));

  return mapping;
}

export const orderGroups: GroupDefinitionsInput = {
  groups: ['Billing', 'Shipping'],
  sequences: {
    Checkout: ['Default', 'Billing', 'Shipping'],
  },
};

/**
 * A fully valid order in every group
 */
export function createValidOrder(): Order {
  const customer = new Customer('Ada');
  customer.address = new Address('1 Main St', 'Springfield');

  const order = new Order('o-1');
  order.customer = customer;
  order.lines = [new OrderLine('ABC-1', 2)];
  return order;
}

export function paths<T>(violations: Set<ConstraintViolation<T>>): string[] {
  return Array.from(violations, v => v.propertyPath).sort();
}

export function describeViolations<T>(violations: Set<ConstraintViolation<T>>): string[] {
  return Array.from(violations, v => `${v.propertyPath}: ${v.message}`).sort();
}
