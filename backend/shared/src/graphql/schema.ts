import {
  ExecutionResult,
  GraphQLBoolean,
  GraphQLFloat,
  GraphQLID,
  GraphQLInputObjectType,
  GraphQLInt,
  GraphQLList,
  GraphQLNonNull,
  GraphQLNullableType,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
  graphql,
} from 'graphql';
import {
  CrmStats,
  Customer,
  CustomerFilter,
  Order,
  OrderFilter,
  OrderItem,
  Product,
  ProductFilter,
} from '../types';
import { CrmService } from '../services/crm-service';
import { fromCents, toCents } from '../utils/format';

export interface CrmContext {
  crm: CrmService;
}

const nonNull = <T extends GraphQLNullableType>(type: T) => new GraphQLNonNull(type);
const nonNullList = <T extends GraphQLNullableType>(type: T) =>
  new GraphQLNonNull(new GraphQLList(new GraphQLNonNull(type)));

function centsOrNull(dollars: number | null | undefined): number | null {
  return dollars === null || dollars === undefined ? null : toCents(dollars);
}

// ---------------------------------------------------------------------------
// Object types
// ---------------------------------------------------------------------------

const CustomerType = new GraphQLObjectType<Customer, CrmContext>({
  name: 'Customer',
  fields: {
    id: { type: nonNull(GraphQLID), resolve: (customer) => customer.customerId },
    name: { type: nonNull(GraphQLString) },
    email: { type: nonNull(GraphQLString) },
    phone: { type: GraphQLString },
    createdAt: { type: nonNull(GraphQLString) },
  },
});

const ProductType = new GraphQLObjectType<Product, CrmContext>({
  name: 'Product',
  fields: {
    id: { type: nonNull(GraphQLID), resolve: (product) => product.productId },
    name: { type: nonNull(GraphQLString) },
    price: { type: nonNull(GraphQLFloat), resolve: (product) => fromCents(product.price) },
    stock: { type: nonNull(GraphQLInt) },
    createdAt: { type: nonNull(GraphQLString) },
  },
});

const OrderItemType = new GraphQLObjectType<OrderItem, CrmContext>({
  name: 'OrderItem',
  fields: {
    productId: { type: nonNull(GraphQLID) },
    productName: { type: nonNull(GraphQLString) },
    quantity: { type: nonNull(GraphQLInt) },
    pricePerUnit: { type: nonNull(GraphQLFloat), resolve: (item) => fromCents(item.pricePerUnit) },
    totalPrice: { type: nonNull(GraphQLFloat), resolve: (item) => fromCents(item.totalPrice) },
  },
});

const OrderType = new GraphQLObjectType<Order, CrmContext>({
  name: 'Order',
  description: 'totalAmount is fixed at creation; later price changes do not affect it.',
  fields: {
    id: { type: nonNull(GraphQLID), resolve: (order) => order.orderId },
    customer: {
      type: CustomerType,
      resolve: (order, _args, { crm }) => crm.getCustomer(order.customerId),
    },
    products: {
      type: nonNullList(ProductType),
      resolve: async (order, _args, { crm }) => {
        const products = await crm.getProducts(order.items.map((item) => item.productId));
        const byId = new Map(products.map((product) => [product.productId, product]));
        return order.items
          .map((item) => byId.get(item.productId))
          .filter((product): product is Product => product !== undefined);
      },
    },
    items: { type: nonNullList(OrderItemType) },
    totalAmount: { type: nonNull(GraphQLFloat), resolve: (order) => fromCents(order.totalAmount) },
    orderDate: { type: nonNull(GraphQLString) },
  },
});

const CrmStatsType = new GraphQLObjectType<CrmStats, CrmContext>({
  name: 'CrmStats',
  fields: {
    totalCustomers: { type: nonNull(GraphQLInt) },
    totalOrders: { type: nonNull(GraphQLInt) },
    totalRevenue: { type: nonNull(GraphQLFloat), resolve: (stats) => fromCents(stats.totalRevenue) },
  },
});

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

const CustomerFilterInput = new GraphQLInputObjectType({
  name: 'CustomerFilterInput',
  fields: {
    nameIcontains: { type: GraphQLString },
    emailIcontains: { type: GraphQLString },
    phoneStartsWith: { type: GraphQLString },
    createdAtGte: { type: GraphQLString },
    createdAtLte: { type: GraphQLString },
  },
});

const ProductFilterInput = new GraphQLInputObjectType({
  name: 'ProductFilterInput',
  fields: {
    nameIcontains: { type: GraphQLString },
    priceGte: { type: GraphQLFloat },
    priceLte: { type: GraphQLFloat },
    stockGte: { type: GraphQLInt },
    stockLte: { type: GraphQLInt },
    lowStock: { type: GraphQLBoolean },
  },
});

const OrderFilterInput = new GraphQLInputObjectType({
  name: 'OrderFilterInput',
  fields: {
    customerName: { type: GraphQLString },
    productName: { type: GraphQLString },
    productId: { type: GraphQLID },
    totalAmountGte: { type: GraphQLFloat },
    totalAmountLte: { type: GraphQLFloat },
    orderDateGte: { type: GraphQLString },
    orderDateLte: { type: GraphQLString },
  },
});

const orderByArg = { type: new GraphQLList(nonNull(GraphQLString)) };

interface ListArgs<F> {
  filter?: F | null;
  orderBy?: string[] | null;
}

interface IdArgs {
  id: string;
}

// ---------------------------------------------------------------------------
// Mutation payloads
// ---------------------------------------------------------------------------

interface CreateCustomerPayload {
  customer: Customer | null;
  message: string | null;
  errors: string[];
}

interface CreateProductPayload {
  product: Product | null;
  errors: string[];
}

interface CreateOrderPayload {
  order: Order | null;
  errors: string[];
}

interface UpdateLowStockProductsPayload {
  updatedProducts: Product[];
  successMessage: string | null;
  errors: string[];
}

const CreateCustomerPayloadType = new GraphQLObjectType<CreateCustomerPayload, CrmContext>({
  name: 'CreateCustomerPayload',
  fields: {
    customer: { type: CustomerType },
    message: { type: GraphQLString },
    errors: { type: nonNullList(GraphQLString) },
  },
});

const CreateProductPayloadType = new GraphQLObjectType<CreateProductPayload, CrmContext>({
  name: 'CreateProductPayload',
  fields: {
    product: { type: ProductType },
    errors: { type: nonNullList(GraphQLString) },
  },
});

const CreateOrderPayloadType = new GraphQLObjectType<CreateOrderPayload, CrmContext>({
  name: 'CreateOrderPayload',
  fields: {
    order: { type: OrderType },
    errors: { type: nonNullList(GraphQLString) },
  },
});

const UpdateLowStockProductsPayloadType = new GraphQLObjectType<UpdateLowStockProductsPayload, CrmContext>({
  name: 'UpdateLowStockProductsPayload',
  fields: {
    updatedProducts: { type: nonNullList(ProductType) },
    successMessage: { type: GraphQLString },
    errors: { type: nonNullList(GraphQLString) },
  },
});

interface CreateCustomerArgs {
  name: string;
  email: string;
  phone?: string | null;
}

interface CreateProductArgs {
  name: string;
  price: number;
  stock?: number | null;
}

interface CreateOrderArgs {
  customerId: string;
  productIds: string[];
  quantity?: number | null;
}

interface UpdateLowStockArgs {
  threshold: number;
  restockAmount: number;
}

// ---------------------------------------------------------------------------
// Roots
// ---------------------------------------------------------------------------

const QueryType = new GraphQLObjectType<unknown, CrmContext>({
  name: 'Query',
  fields: {
    hello: {
      type: GraphQLString,
      resolve: (_root, _args, { crm }) => crm.hello(),
    },
    customers: {
      type: nonNullList(CustomerType),
      args: { filter: { type: CustomerFilterInput }, orderBy: orderByArg },
      resolve: (_root, args: ListArgs<CustomerFilter>, { crm }) =>
        crm.listCustomers(args.filter, args.orderBy),
    },
    customer: {
      type: CustomerType,
      args: { id: { type: nonNull(GraphQLID) } },
      resolve: (_root, args: IdArgs, { crm }) => crm.getCustomer(args.id),
    },
    products: {
      type: nonNullList(ProductType),
      args: { filter: { type: ProductFilterInput }, orderBy: orderByArg },
      resolve: (_root, args: ListArgs<ProductFilter>, { crm }) => {
        const filter = args.filter
          ? { ...args.filter, priceGte: centsOrNull(args.filter.priceGte), priceLte: centsOrNull(args.filter.priceLte) }
          : null;
        return crm.listProducts(filter, args.orderBy);
      },
    },
    product: {
      type: ProductType,
      args: { id: { type: nonNull(GraphQLID) } },
      resolve: (_root, args: IdArgs, { crm }) => crm.getProduct(args.id),
    },
    orders: {
      type: nonNullList(OrderType),
      args: { filter: { type: OrderFilterInput }, orderBy: orderByArg },
      resolve: (_root, args: ListArgs<OrderFilter>, { crm }) => {
        const filter = args.filter
          ? {
              ...args.filter,
              totalAmountGte: centsOrNull(args.filter.totalAmountGte),
              totalAmountLte: centsOrNull(args.filter.totalAmountLte),
            }
          : null;
        return crm.listOrders(filter, args.orderBy);
      },
    },
    order: {
      type: OrderType,
      args: { id: { type: nonNull(GraphQLID) } },
      resolve: (_root, args: IdArgs, { crm }) => crm.getOrder(args.id),
    },
    crmStats: {
      type: nonNull(CrmStatsType),
      resolve: (_root, _args, { crm }) => crm.getStats(),
    },
  },
});

const MutationType = new GraphQLObjectType<unknown, CrmContext>({
  name: 'Mutation',
  fields: {
    createCustomer: {
      type: nonNull(CreateCustomerPayloadType),
      args: {
        name: { type: nonNull(GraphQLString) },
        email: { type: nonNull(GraphQLString) },
        phone: { type: GraphQLString },
      },
      resolve: async (_root, args: CreateCustomerArgs, { crm }): Promise<CreateCustomerPayload> => {
        const result = await crm.createCustomer(args);
        return result.ok
          ? { customer: result.value, message: 'Customer created successfully', errors: [] }
          : { customer: null, message: null, errors: result.errors };
      },
    },
    createProduct: {
      type: nonNull(CreateProductPayloadType),
      args: {
        name: { type: nonNull(GraphQLString) },
        price: { type: nonNull(GraphQLFloat) },
        stock: { type: GraphQLInt },
      },
      resolve: async (_root, args: CreateProductArgs, { crm }): Promise<CreateProductPayload> => {
        const result = await crm.createProduct({ ...args, price: toCents(args.price) });
        return result.ok
          ? { product: result.value, errors: [] }
          : { product: null, errors: result.errors };
      },
    },
    createOrder: {
      type: nonNull(CreateOrderPayloadType),
      args: {
        customerId: { type: nonNull(GraphQLID) },
        productIds: { type: nonNullList(GraphQLID) },
        quantity: { type: GraphQLInt, defaultValue: 1 },
      },
      resolve: async (_root, args: CreateOrderArgs, { crm }): Promise<CreateOrderPayload> => {
        const result = await crm.createOrder(args);
        return result.ok
          ? { order: result.value, errors: [] }
          : { order: null, errors: result.errors };
      },
    },
    updateLowStockProducts: {
      type: nonNull(UpdateLowStockProductsPayloadType),
      args: {
        threshold: { type: GraphQLInt, defaultValue: 10 },
        restockAmount: { type: GraphQLInt, defaultValue: 10 },
      },
      resolve: async (_root, args: UpdateLowStockArgs, { crm }): Promise<UpdateLowStockProductsPayload> => {
        const result = await crm.restockLowStockProducts(args.threshold, args.restockAmount);
        return result.ok
          ? {
              updatedProducts: result.value.updated.map(({ product }) => product),
              successMessage: result.value.message,
              errors: [],
            }
          : { updatedProducts: [], successMessage: null, errors: result.errors };
      },
    },
  },
});

export const crmSchema = new GraphQLSchema({
  query: QueryType,
  mutation: MutationType,
});

export interface CrmOperation {
  source: string;
  variableValues?: Record<string, unknown> | null;
  operationName?: string | null;
}

export function executeCrmOperation(
  operation: CrmOperation,
  context: CrmContext
): Promise<ExecutionResult> {
  return graphql({
    schema: crmSchema,
    source: operation.source,
    variableValues: operation.variableValues,
    operationName: operation.operationName,
    contextValue: context,
  });
}
