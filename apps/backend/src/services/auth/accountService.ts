import type { SignupRequest, TokenPair } from "@lasercare/shared-schemas";
import { AuthenticationError, BadRequestError } from "../../http/errors.js";
import type { ServiceContext } from "../entityService.js";
import type { UserService } from "../identity/userService.js";
import type { UserStore } from "../identity/userStore.js";
import { verifyPassword } from "./passwords.js";
import type { TokenService } from "./tokens.js";

export class AccountService {
  constructor(
    private readonly users: UserStore,
    private readonly userService: UserService,
    private readonly tokens: TokenService,
    private readonly ctx: ServiceContext
  ) {}

  // Self-registration always yields a customer account.
  async signup(request: SignupRequest): Promise<TokenPair> {
    const user = await this.userService.create({ ...request, role: "CUSTOMER" });
    return this.tokens.issuePair(user);
  }

  async login(username: string, password: string): Promise<TokenPair> {
    const user = await this.users.findByUsername(username);
    if (!user || !(await verifyPassword(password, user.password_hash))) {
      this.ctx.log.warn({ username }, "login failed");
      throw new AuthenticationError("Invalid credentials");
    }
    this.ctx.log.info({ userId: user.id }, "login succeeded");
    return this.tokens.issuePair(user);
  }

  async refresh(refreshToken: string): Promise<{ access: string }> {
    const userId = this.tokens.verifyRefresh(refreshToken);
    const user = userId === null ? null : await this.users.get(userId);
    if (!user) throw new BadRequestError("Invalid refresh token");
    return { access: this.tokens.issueAccess(user) };
  }

  // No mail transport is configured; both steps only acknowledge the request.
  forgotPassword(email: string): { message: string } {
    this.ctx.log.info({ email }, "password reset requested");
    return { message: "Password reset link sent." };
  }

  resetPassword(): { message: string } {
    this.ctx.log.info("password reset submitted");
    return { message: "Password has been reset." };
  }
}
