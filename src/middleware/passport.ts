import passport from 'passport';
import { Strategy as JwtStrategy, ExtractJwt } from 'passport-jwt';
import { ObjectId } from 'mongodb';
import { getDB } from './database';

const JWT_SECRET = process.env.JWT_SECRET || 'secret-key';

interface UserDoc {
    email?: string;
}

/** The user id a token names, or null when the payload carries none. */
export const userIdFromPayload = (payload: unknown): string | null => {
    if (typeof payload !== 'object' || payload === null || !('id' in payload)) return null;
    const { id } = payload;
    return typeof id === 'string' && ObjectId.isValid(id) ? id : null;
};

passport.use('jwt', new JwtStrategy(
    {
        jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
        secretOrKey: JWT_SECRET
    },
    async (jwtPayload: unknown, done: (error: unknown, user?: Express.User | false) => void) => {
        try {
            const id = userIdFromPayload(jwtPayload);
            if (!id) {
                return done(null, false);
            }
            const users = getDB().collection<UserDoc>('users');
            const user = await users.findOne(
                { _id: new ObjectId(id) },
                { projection: { email: 1 } }
            );

            if (user) {
                return done(null, { id: user._id.toHexString(), email: user.email ?? '' });
            } else {
                return done(null, false);
            }
        } catch (error) {
            return done(error);
        }
    }
));

export default passport;
