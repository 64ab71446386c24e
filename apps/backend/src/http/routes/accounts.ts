import type { FastifyInstance } from "fastify";
import {
  ForgotPasswordRequestSchema,
  LoginRequestSchema,
  ResetPasswordRequestSchema,
  SignupRequestSchema,
  TokenRefreshRequestSchema,
} from "@lasercare/shared-schemas";
import type { AccountService } from "../../services/auth/accountService.js";
import { parseBody } from "../validation.js";

type Deps = { accounts: AccountService };

export function registerAccountRoutes(app: FastifyInstance, { accounts }: Deps) {
  app.post("/accounts/signup", async (req, reply) => {
    const tokens = await accounts.signup(parseBody(SignupRequestSchema, req.body));
    reply.code(201);
    return tokens;
  });

  app.post("/accounts/login", async (req) => {
    const { username, password } = parseBody(LoginRequestSchema, req.body);
    return accounts.login(username, password);
  });

  app.post("/accounts/forgot-password", async (req) => {
    const { email } = parseBody(ForgotPasswordRequestSchema, req.body);
    return accounts.forgotPassword(email);
  });

  app.post("/accounts/reset-password", async (req) => {
    parseBody(ResetPasswordRequestSchema, req.body);
    return accounts.resetPassword();
  });

  app.post("/accounts/token/refresh", async (req) => {
    const { refresh } = parseBody(TokenRefreshRequestSchema, req.body);
    return accounts.refresh(refresh);
  });
}
