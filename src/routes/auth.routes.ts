import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { getAdminCredentials, signAccessToken, verifyPassword } from '../lib/auth';

const router = Router();

const loginSchema = z.object({
  username: z.string().min(1).max(255),
  password: z.string().min(1).max(1024)
});

router.post('/api/auth/login', async (req: Request, res: Response) => {
  const parsed = loginSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.flatten() });
  }

  const admin = getAdminCredentials();
  if (!admin) {
    return res.status(503).json({ success: false, error: 'Login is not configured.' });
  }

  try {
    const valid =
      parsed.data.username === admin.username && (await verifyPassword(parsed.data.password, admin.passwordHash));
    if (!valid) {
      return res.status(401).json({ success: false, error: 'Invalid credentials.' });
    }
    const accessToken = signAccessToken({ sub: admin.username, role: 'admin' });
    return res.json({ success: true, access_token: accessToken, token_type: 'Bearer' });
  } catch (error) {
    console.error(error);
    return res.status(500).json({ success: false, error: 'Failed to log in.' });
  }
});

export default router;
