// Load environment variables from .env at the repo root before any test module reads them.
import 'dotenv/config';
