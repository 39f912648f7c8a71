/**
 * warden-jwt - Basic Example Server
 *
 * A complete example showing:
 * - Warden setup with a serializer and a blacklist
 * - Login issuing a signed token
 * - Authentication and scope authorization middleware
 * - Logout by blacklisting the token id
 */

import express from 'express';
import {
  Warden,
  InMemoryRevocationRepo,
  Serializer,
  Token,
  TokenClaims,
  wardenAuthentication,
  wardenAuthorization,
  currentToken,
  currentUser,
  currentScope,
  generateSecret,
} from '../src';

// ============================================================================
// CONFIGURATION
// ============================================================================

const PORT = 3000;

interface User {
  id: number;
  email: string;
  scopes: string[];
}

// Simulated user database
const USERS: Record<string, User & { password: string }> = {
  'user@example.com': {
    id: 1,
    email: 'user@example.com',
    password: 'password123',
    scopes: ['post/read'],
  },
  'admin@example.com': {
    id: 2,
    email: 'admin@example.com',
    password: 'admin123',
    scopes: ['post/read', 'post/write', 'post/delete', 'admin/read'],
  },
};

const userSerializer: Serializer<User> = {
  forToken: (user: User): TokenClaims => ({
    sub: user.id,
    scopes: user.scopes,
    meta: { email: user.email },
  }),
  fromToken: (token: Token): User => {
    const user = Object.values(USERS).find((candidate) => candidate.id === token.sub);
    if (!user) {
      throw new Error(`Unknown user ${String(token.sub)}`);
    }
    return { id: user.id, email: user.email, scopes: user.scopes };
  },
};

// ============================================================================
// MAIN
// ============================================================================

async function main() {
  console.log('Starting warden-jwt example server...\n');

  const warden = new Warden<User>({
    secret: process.env.WARDEN_SECRET ?? generateSecret(),
    defaultIss: 'example-api',
    defaultTtl: 300, // 5 minutes
    serializer: userSerializer,
    blacklist: new InMemoryRevocationRepo(),
  });

  const app = express();
  app.use(express.json());

  // Public routes
  app.get('/api/public', (req, res) => {
    res.json({ message: 'This is a public endpoint' });
  });

  app.post('/auth/login', async (req, res, next) => {
    const { email, password } = req.body ?? {};
    const user = typeof email === 'string' ? USERS[email] : undefined;
    if (!user || user.password !== password) {
      res.status(401).json({ error: 'invalid_credentials' });
      return;
    }
    try {
      res.json({ token: await warden.forToken(user) });
    } catch (error) {
      next(error);
    }
  });

  // Protected routes
  const authenticate = wardenAuthentication({ warden });

  app.post('/auth/logout', authenticate, async (req, res, next) => {
    const token = currentToken(req);
    try {
      if (token) {
        await warden.blacklist(token);
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/profile', authenticate, (req, res) => {
    res.json({ message: 'This is your profile', user: currentUser(req) });
  });

  app.get('/api/posts', authenticate, wardenAuthorization({ permits: ['post', 'admin'] }), (req, res) => {
    res.json({
      grantedBy: currentScope(req),
      posts: [
        { id: 1, title: 'First post' },
        { id: 2, title: 'Second post' },
      ],
    });
  });

  app.delete('/api/posts/:id', authenticate, wardenAuthorization({ permits: ['post'] }), (req, res) => {
    res.json({ deleted: req.params.id, grantedBy: currentScope(req) });
  });

  app.listen(PORT, () => {
    console.log(`warden-jwt example server running at http://localhost:${PORT}\n`);
    console.log('   POST   /auth/login      - Login and get a token');
    console.log('   POST   /auth/logout     - Blacklist the current token');
    console.log('   GET    /api/public      - Public endpoint');
    console.log('   GET    /api/profile     - Protected (any valid token)');
    console.log('   GET    /api/posts       - Protected (post/read or admin/read)');
    console.log('   DELETE /api/posts/:id   - Protected (post/delete)');
    console.log('\n   # Login');
    console.log(`   curl -X POST http://localhost:${PORT}/auth/login \\`);
    console.log('     -H "Content-Type: application/json" \\');
    console.log('     -d \'{"email":"user@example.com","password":"password123"}\'');
  });
}

// Run
main().catch(console.error);
