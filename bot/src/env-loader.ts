// Loaded before anything reads process.env, the logger included.
import dotenv from 'dotenv';

dotenv.config();
