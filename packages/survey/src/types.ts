/**
 * Opaque identity minted for every survey session.
 */
export type SessionId = string

export type SurveyQuestionName =
  | "user-type"
  | "market-fit"
  | "nps"
  | "promoter-feedback"
  | "passive-feedback"
  | "detractor-feedback"

export type SurveyQuestion = {
  questionId: string
  questionName: SurveyQuestionName
}

/**
 * The question currently shown to the user, derived from the session's
 * question list.
 */
export type EphemeralSurveyQuestion = {
  question: SurveyQuestion
  currentQuestionIndex: number
  totalQuestionCount: number
}

export type UserTypeAnswer = "learner" | "teacher" | "parent" | "other"

export type MarketFitAnswer =
  | "very-disappointed"
  | "somewhat-disappointed"
  | "not-disappointed"
  | "not-applicable"

export type SurveyAnswer =
  | { type: "user-type"; userType: UserTypeAnswer }
  | { type: "market-fit"; marketFit: MarketFitAnswer }
  | { type: "nps"; score: number }
  | { type: "free-form"; text: string }

export type SurveySelectedAnswer = {
  questionName: SurveyQuestionName
  answer: SurveyAnswer
}
