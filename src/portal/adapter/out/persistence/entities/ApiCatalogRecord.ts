import { z } from 'zod'
import { API_DEFINITION_TYPES } from '../../../../application/domain/model/Api'

/**
 * apis テーブル（および exposed_apis ビュー）の行
 */
export const ApiRecordSchema = z.object({
    organization_id: z.string(),
    organization_name: z.string(),
    id: z.string(),
    name: z.string(),
    description: z.string().nullable(),
    created_on: z.string(),
    featured: z.boolean(),
})

export type ApiRecord = z.infer<typeof ApiRecordSchema>

/**
 * api_versions テーブルの行
 */
export const ApiVersionRecordSchema = z.object({
    organization_id: z.string(),
    api_id: z.string(),
    version: z.string(),
    status: z.enum(['Created', 'Ready', 'Published', 'Retired']),
    expose_in_portal: z.boolean(),
    created_on: z.string(),
    description: z.string().nullable(),
    definition_type: z.enum(API_DEFINITION_TYPES),
    endpoint: z.string().nullable(),
    published_on: z.string().nullable(),
})

export type ApiVersionRecord = z.infer<typeof ApiVersionRecordSchema>

/**
 * api_plans テーブルの行
 */
export const ApiPlanRecordSchema = z.object({
    plan_id: z.string(),
    plan_name: z.string(),
    plan_description: z.string().nullable(),
    plan_version: z.string(),
    requires_approval: z.boolean(),
    expose_in_portal: z.boolean(),
})

export type ApiPlanRecord = z.infer<typeof ApiPlanRecordSchema>

/**
 * api_policies テーブルの行
 */
export const ApiPolicyRecordSchema = z.object({
    policy_definition_id: z.string(),
    name: z.string(),
    description: z.string().nullable(),
    icon: z.string().nullable(),
    order_index: z.number().int(),
})

export type ApiPolicyRecord = z.infer<typeof ApiPolicyRecordSchema>

export const ApiDefinitionRecordSchema = z.object({
    definition: z.string(),
})
