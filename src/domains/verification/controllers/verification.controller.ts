import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { VERIFICATION_TYPES } from '../../../shared/constants/verification';
import { phoneNumberSchema } from '../../../shared/utils/phone';
import { PhoneVerificationService } from '../services/otp.service';

const RequestOtpSchema = z.object({
    phone: phoneNumberSchema,
    verificationType: z.enum(VERIFICATION_TYPES).default('registration')
});

const VerifyOtpSchema = z.object({
    phone: phoneNumberSchema,
    code: z.string().trim().regex(/^\d{6}$/, 'Code must be 6 digits'),
    verificationType: z.enum(VERIFICATION_TYPES).default('registration')
});

const PhoneParamsSchema = z.object({ phone: phoneNumberSchema });

export class VerificationController {
    constructor(private verification: PhoneVerificationService) {}

    requestOtp = async (req: FastifyRequest, reply: FastifyReply) => {
        const { phone, verificationType } = RequestOtpSchema.parse(req.body);
        const result = await this.verification.requestOtp(phone, verificationType);

        return reply.send({ success: result.sent, data: result });
    };

    verifyOtp = async (req: FastifyRequest, reply: FastifyReply) => {
        const { phone, code, verificationType } = VerifyOtpSchema.parse(req.body);
        const result = await this.verification.verifyOtp(phone, code, verificationType);

        return reply.send({
            success: result.verified,
            data: result,
            message: result.verified ? 'Phone number verified successfully' : 'Invalid or expired OTP'
        });
    };

    getStatus = async (req: FastifyRequest, reply: FastifyReply) => {
        const { phone } = PhoneParamsSchema.parse(req.params);
        const status = await this.verification.getOtpStatus(phone);

        return reply.send({ success: true, data: status });
    };

    getStatistics = async (_req: FastifyRequest, reply: FastifyReply) => {
        const stats = await this.verification.getStatistics();
        return reply.send({ success: true, data: stats });
    };
}
