import 'reflect-metadata';
import { AppDataSource } from '../data-source.js';
import { AdminService } from '../services/admin.service.js';
import { isAppError } from '../utils/errors.js';

const adminService = new AdminService({ dataSource: AppDataSource });

async function initializeDB() {
  if (!AppDataSource.isInitialized) {
    await AppDataSource.initialize();
  }
}

function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${unit === 0 ? value : value.toFixed(1)} ${units[unit]}`;
}

async function listUsers() {
  await initializeDB();
  const users = await adminService.listUsers();

  if (users.length === 0) {
    console.log('\n📭 No users found.\n');
    return;
  }

  console.log('\n📋 Users:\n');
  console.log('━'.repeat(100));
  console.log(
    'ID'.padEnd(6) + 'Username'.padEnd(24) + 'Role'.padEnd(8) + 'Status'.padEnd(14) + 'Storage'.padEnd(28) + 'Created'
  );
  console.log('━'.repeat(100));

  users.forEach((user) => {
    const status = user.isActive ? '✅ Active' : '❌ Inactive';
    const storage = `${formatBytes(user.usedStorage)} / ${formatBytes(user.storageLimit)}`;
    const created = user.createdAt.toISOString().split('T')[0];

    console.log(
      String(user.id).padEnd(6) +
        user.username.padEnd(24) +
        user.role.padEnd(8) +
        status.padEnd(14) +
        storage.padEnd(28) +
        created
    );
  });

  console.log('━'.repeat(100));
  console.log(`\nTotal: ${users.length} user(s)\n`);
}

async function activateUser(id: number) {
  await initializeDB();
  const user = await adminService.activateUser(id);
  console.log(`\n✅ User "${user.username}" (ID: ${id}) has been activated.\n`);
}

async function lockUser(id: number) {
  await initializeDB();
  const user = await adminService.lockUser(id);
  console.log(`\n✅ User "${user.username}" (ID: ${id}) has been locked.\n`);
}

async function setQuota(id: number, bytes: number) {
  await initializeDB();
  const user = await adminService.updateStorageLimit(id, bytes);
  console.log(`\n✅ Storage limit for "${user.username}" (ID: ${id}) set to ${formatBytes(bytes)}.\n`);
}

async function reconcile(id: number) {
  await initializeDB();
  const usage = await adminService.reconcileStorage(id);
  console.log(
    `\n✅ Storage for user ID ${id} recalculated: ${formatBytes(usage.usedStorage)} of ${formatBytes(usage.storageLimit)} used.\n`
  );
}

function printHelp() {
  console.log(`
User Management CLI

Usage:
  npm run user:list                                   List all users
  npm run user:activate -- --id <user-id>             Activate an account
  npm run user:lock -- --id <user-id>                 Lock an account
  npm run user:quota -- --id <user-id> --bytes <n>    Set a storage limit
  npm run user:reconcile -- --id <user-id>            Recalculate used storage
  npm run user:help                                   Show this help

Examples:
  npm run user:activate -- --id 2
  npm run user:quota -- --id 2 --bytes 1073741824
`);
}

function numericArg(args: string[], flag: string, usage: string): number {
  const index = args.indexOf(flag);
  const raw = index === -1 ? undefined : args[index + 1];
  if (!raw || !/^\d+$/.test(raw)) {
    console.error(`\n❌ Error: ${flag} argument required\n`);
    console.log(`Usage: ${usage}\n`);
    process.exit(1);
  }
  return parseInt(raw, 10);
}

// Parse command-line arguments
const args = process.argv.slice(2);
const command = args[0];

(async () => {
  try {
    switch (command) {
      case 'list':
        await listUsers();
        break;

      case 'activate':
        await activateUser(numericArg(args, '--id', 'npm run user:activate -- --id <user-id>'));
        break;

      case 'lock':
        await lockUser(numericArg(args, '--id', 'npm run user:lock -- --id <user-id>'));
        break;

      case 'quota': {
        const usage = 'npm run user:quota -- --id <user-id> --bytes <n>';
        await setQuota(numericArg(args, '--id', usage), numericArg(args, '--bytes', usage));
        break;
      }

      case 'reconcile':
        await reconcile(numericArg(args, '--id', 'npm run user:reconcile -- --id <user-id>'));
        break;

      case 'help':
      case '--help':
      case '-h':
        printHelp();
        break;

      default:
        console.error(`\n❌ Unknown command: ${command}\n`);
        printHelp();
        process.exit(1);
    }
  } catch (error) {
    if (isAppError(error)) {
      console.error(`\n❌ ${error.message}\n`);
    } else {
      console.error('\n❌ Error:', error);
    }
    process.exitCode = 1;
  } finally {
    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
    }
  }
})();
