import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import type { AuthenticatedUser } from '../../common/interfaces/authenticated-user.interface';
import type { JwtPayload } from '../../common/interfaces/jwt-payload.interface';
import { NotAuthenticatedError } from '../../shared/domain/errors/domain.errors';
import { UsersService } from '../../users/users.service';

/**
 * Accepts access tokens from the identity provider; `sub` is the user id.
 * The profile is attached when it can be read and left null otherwise.
 */
@Injectable()
export class JwtAccessStrategy extends PassportStrategy(Strategy) {
    constructor(
        configService: ConfigService,
        private readonly usersService: UsersService,
    ) {
        super({
            jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
            ignoreExpiration: false,
            secretOrKey: configService.get<string>('JWT_SECRET', 'dev-secret-change-me'),
            algorithms: ['HS256'],
        });
    }

    async validate(payload: JwtPayload): Promise<AuthenticatedUser> {
        if (!payload.sub || (payload.tokenType !== undefined && payload.tokenType !== 'access')) {
            throw new NotAuthenticatedError();
        }

        return {
            id: payload.sub,
            email: payload.email ?? null,
            profile: await this.usersService.loadSessionProfile(payload.sub),
        };
    }
}
