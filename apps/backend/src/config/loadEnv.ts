import dotenv from 'dotenv';

// Fills gaps only: variables already set by the process manager win over .env.
dotenv.config();
