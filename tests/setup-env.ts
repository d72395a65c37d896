process.env.CUSTOMERS_TABLE_NAME = 'crm-customers-test';
process.env.CUSTOMER_EMAILS_TABLE_NAME = 'crm-customer-emails-test';
process.env.PRODUCTS_TABLE_NAME = 'crm-products-test';
process.env.ORDERS_TABLE_NAME = 'crm-orders-test';
process.env.AWS_REGION = 'us-east-1';
process.env.LOG_LEVEL = 'ERROR';
