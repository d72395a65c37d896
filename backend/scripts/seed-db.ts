import {
  CreateCustomerInput,
  CreateProductInput,
  CrmService,
  CustomerRepository,
  DUPLICATE_EMAIL_MESSAGE,
  OrderRepository,
  ProductRepository,
  logger,
  toCents,
  validateEnvironment,
} from 'crm-backend-shared';

export interface SeedData {
  customers: CreateCustomerInput[];
  products: CreateProductInput[];
}

export interface SeedSummary {
  customersCreated: number;
  customersSkipped: number;
  productsCreated: number;
  productsSkipped: number;
}

export const DEFAULT_SEED: SeedData = {
  customers: [{ name: 'Test User', email: 'test@example.com', phone: '+1234567890' }],
  products: [
    { name: 'Phone', price: toCents(500), stock: 5 },
    { name: 'Tablet', price: toCents(800), stock: 2 },
  ],
};

/**
 * Insert sample customers and products. Customers whose email already
 * exists and products whose name already exists are skipped, so the seed
 * can be run more than once.
 */
export async function seedDatabase(crm: CrmService, seed: SeedData = DEFAULT_SEED): Promise<SeedSummary> {
  const summary: SeedSummary = {
    customersCreated: 0,
    customersSkipped: 0,
    productsCreated: 0,
    productsSkipped: 0,
  };

  for (const input of seed.customers) {
    const result = await crm.createCustomer(input);
    if (result.ok) {
      summary.customersCreated++;
    } else if (result.errors.includes(DUPLICATE_EMAIL_MESSAGE)) {
      summary.customersSkipped++;
      logger.info('Seed customer already exists', { email: input.email });
    } else {
      throw new Error(`Failed to seed customer ${input.email}: ${result.errors.join('; ')}`);
    }
  }

  const existingNames = new Set(
    (await crm.listProducts()).map((product) => product.name.toLowerCase())
  );

  for (const input of seed.products) {
    if (existingNames.has(input.name.trim().toLowerCase())) {
      summary.productsSkipped++;
      logger.info('Seed product already exists', { name: input.name });
      continue;
    }

    const result = await crm.createProduct(input);
    if (!result.ok) {
      throw new Error(`Failed to seed product ${input.name}: ${result.errors.join('; ')}`);
    }
    existingNames.add(result.value.name.toLowerCase());
    summary.productsCreated++;
  }

  logger.info('Database seeded', { ...summary });
  return summary;
}

async function main(): Promise<void> {
  validateEnvironment(['CUSTOMERS_TABLE_NAME', 'CUSTOMER_EMAILS_TABLE_NAME', 'PRODUCTS_TABLE_NAME', 'ORDERS_TABLE_NAME']);

  const crm = new CrmService({
    customers: new CustomerRepository(),
    products: new ProductRepository(),
    orders: new OrderRepository(),
  });

  await seedDatabase(crm);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Seeding failed', error);
    process.exitCode = 1;
  });
}
