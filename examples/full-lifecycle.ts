import { ProvisioningClient, ProvisioningAPIError } from '../src/index.js';

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) throw new Error(`Missing environment variable ${name}`);
  return value;
}

async function main() {
  // 1. Create client
  const client = new ProvisioningClient({
    clientId: requireEnv('PROVISIONING_CLIENT_ID'),
    clientSecret: requireEnv('PROVISIONING_CLIENT_SECRET'),
    baseUrl: process.env.PROVISIONING_URL,
    logger: (line) => console.debug(line),
  });

  const tenantId = await client.getTenantId();
  console.log(`Using tenant: ${tenantId}`);

  // 2. Create an instance
  const name = `sdk-demo-${Date.now().toString(36)}`;
  console.log(`\nCreating instance '${name}'...`);
  const created = await client.createInstance(name);
  console.log(`Instance created: ${created.id} (user: ${created.username})`);

  try {
    // 3. Wait for it to come up
    const running = await client.waitForRunning(created.id, { timeout: 15 * 60_000 });
    if (!running) {
      console.log('Instance did not reach RUNNING.');
      return;
    }

    const info = await client.getInstance(created.id);
    console.log(`Connect at: ${info?.connectionUrl}`);

    // 4. List everything
    const all = await client.listInstances();
    console.log(`Total instances: ${all.length}`);
  } finally {
    // 5. Cleanup
    console.log(`\nDeleting instance '${created.id}'...`);
    try {
      const deleted = await client.deleteInstance(created.id);
      console.log(`Done (status: ${deleted.status}).`);
    } catch (err) {
      if (err instanceof ProvisioningAPIError && err.isNotFound()) {
        console.log('Already deleted.');
      } else {
        throw err;
      }
    }
  }
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
