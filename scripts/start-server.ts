import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { loadConfigOrExit, startServer } from '../src/server.js';

async function prepareDirectories(staticDir: string): Promise<void> {
  for (const directory of [staticDir, path.join(staticDir, 'banners')]) {
    await fs.promises.mkdir(directory, { recursive: true });
    console.log(`✓ Directory ${path.relative(process.cwd(), directory) || '.'}/ ready`);
  }
}

async function main() {
  console.log('StreamHub - Video Streaming Platform');
  console.log('='.repeat(40));

  try {
    const config = loadConfigOrExit();
    await prepareDirectories(config.staticDir);

    const baseUrl = config.publicBaseUrl ?? `http://localhost:${config.port}`;
    console.log('\nPlatform URLs:');
    console.log(`  Homepage:     ${baseUrl}/`);
    console.log(`  Admin Panel:  ${baseUrl}/admin`);
    console.log(`  Video API:    ${baseUrl}/api/videos`);
    console.log(`  Health Check: ${baseUrl}/health`);
    console.log(`\n${'='.repeat(40)}\nPress Ctrl+C to stop the server\n`);

    await startServer(config);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void main();
