import dotenv from 'dotenv';
import path from 'path';

// Load env vars from the directory the tool is started in
dotenv.config({ path: path.resolve(process.cwd(), '.env') });
