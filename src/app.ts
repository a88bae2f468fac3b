import express from 'express';
import cors, { type CorsOptions } from 'cors';
import { pool } from './connections';
import { appConfig } from './connections/config/app.config';
import routes from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

const app = express();

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
];

// CORS Configuration
const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Requests without origin (curl, the truck's kiosk)
    if (!origin) {
      return callback(null, true);
    }

    const allowedOrigins = [
      ...appConfig.corsOrigins,
      ...(appConfig.nodeEnv === 'development' ? DEV_ORIGINS : []),
    ];

    if (allowedOrigins.includes(origin)) {
      return callback(null, true);
    }

    // In development, allow all origins if CORS_ORIGINS is not set
    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }

    callback(new Error('Not allowed by CORS'));
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Origin'],
  exposedHeaders: [
    'X-RateLimit-Limit',
    'X-RateLimit-Remaining',
    'X-RateLimit-Reset',
    'Retry-After',
  ],
  maxAge: 86400,
  optionsSuccessStatus: 200,
};

// Middleware
app.use(cors(corsOptions));
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Health check
app.get('/health', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    res.json({ status: 'ok', database: 'connected' });
  } catch {
    res.status(500).json({ status: 'error', database: 'disconnected' });
  }
});

// API Routes
app.use('/api', routes);

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

export default app;
