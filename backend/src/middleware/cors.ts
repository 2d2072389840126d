import cors from 'cors';

/**
 * CORS Configuration
 * Allows the operator dashboard to call the API from another origin
 */

export function createCorsMiddleware(frontendUrl?: string) {
  const allowedOrigins = [
    'http://localhost:5173', // Vite dev server default
    'http://localhost:3000', // Alternate frontend port
    frontendUrl || '', // Production frontend URL
  ].filter(Boolean);

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (SMS provider webhooks, curl)
      if (!origin) {
        return callback(null, true);
      }

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Debug-Token'],
  };

  return cors(corsOptions);
}
