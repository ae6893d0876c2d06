/** Shapes of the Graph API responses this module reads. Numbers arrive as strings. */

export type GraphPage<T> = {
  data?: T[]
  paging?: {
    cursors?: { before?: string; after?: string }
    next?: string
  }
}

export type GraphAction = {
  action_type: string
  value: string
}

export type GraphInsightRow = {
  account_id?: string
  campaign_id?: string
  campaign_name?: string
  ad_id?: string
  ad_name?: string
  objective?: string
  date_start?: string
  date_stop?: string
  spend?: string
  impressions?: string
  clicks?: string
  actions?: GraphAction[]
  action_values?: GraphAction[]
}

export type GraphUser = {
  id: string
  name?: string
}

export type GraphPermission = {
  permission: string
  status: 'granted' | 'declined' | 'expired'
}

export type AdAccount = {
  id: string
  account_id: string
  name?: string
  currency?: string
  account_status?: number
}

export type TokenValidation = {
  valid: boolean
  message: string
  userId: string | null
  userName: string | null
  granted: string[]
  missing: string[]
}
