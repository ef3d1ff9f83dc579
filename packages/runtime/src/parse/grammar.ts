import * as ohm from 'ohm-js'

/**
 * Lode declaration grammar.
 *
 * Covers type declarations, their members, type annotations and the
 * statements and expressions that may appear in function blocks.
 * Line and block comments are treated as whitespace.
 */
const grammarSource = String.raw`
Lode {
  Program = Declaration*

  // Declarations
  Declaration = InterfaceDeclaration | CompositeDeclaration
  InterfaceDeclaration = AccessModifier? compositeKind interface identifier "{" Member* "}"
  CompositeDeclaration = AccessModifier? compositeKind identifier Conformances? "{" Member* "}"
  Conformances = ":" NonemptyListOf<NominalType, ",">

  Member = FieldDeclaration
         | FunctionDeclaration
         | EnumCaseDeclaration
         | Declaration
         | SpecialFunctionDeclaration

  FieldDeclaration = AccessModifier? variableKind identifier ":" TypeAnnotation
  FunctionDeclaration = AccessModifier? fun identifier ParameterList ReturnType? FunctionBlock?
  SpecialFunctionDeclaration = specialFunctionName ParameterList FunctionBlock?
  EnumCaseDeclaration = AccessModifier? case identifier

  ParameterList = "(" ListOf<Parameter, ","> ")"
  Parameter = identifier identifier ":" TypeAnnotation  -- labeled
            | identifier ":" TypeAnnotation             -- unlabeled
  ReturnType = ":" TypeAnnotation

  AccessModifier = pub "(" "set" ")"             -- pubSet
                 | pub                           -- pub
                 | priv                          -- priv
                 | access "(" accessScope ")"    -- scoped
  accessScope = "self" | "contract" | "account" | "all"

  // Function blocks
  FunctionBlock = "{" PreConditions? PostConditions? Statement* "}"
  PreConditions = pre "{" Condition* "}"
  PostConditions = post "{" Condition* "}"
  Condition = Expression ConditionMessage? ";"?
  ConditionMessage = ":" Expression

  // Statements
  Statement = StatementBody ";"?
  StatementBody = VariableDeclaration | ReturnStatement | Assignment | ExpressionStatement
  VariableDeclaration = variableKind identifier TypeSuffix? transfer Expression
  TypeSuffix = ":" TypeAnnotation
  ReturnStatement = return Expression?
  Assignment = Expression transfer Expression
  ExpressionStatement = Expression
  transfer = "<-" | "=" ~"="

  // Expressions
  Expression = OrExpression
  OrExpression = OrExpression "||" AndExpression  -- binary
               | AndExpression
  AndExpression = AndExpression "&&" EqualityExpression  -- binary
                | EqualityExpression
  EqualityExpression = EqualityExpression equalityOperator RelationalExpression  -- binary
                     | RelationalExpression
  RelationalExpression = RelationalExpression relationalOperator AdditiveExpression  -- binary
                       | AdditiveExpression
  AdditiveExpression = AdditiveExpression additiveOperator MultiplicativeExpression  -- binary
                     | MultiplicativeExpression
  MultiplicativeExpression = MultiplicativeExpression multiplicativeOperator UnaryExpression  -- binary
                           | UnaryExpression
  UnaryExpression = "!" UnaryExpression      -- not
                  | "-" UnaryExpression      -- negate
                  | "<-" UnaryExpression     -- move
                  | create PostfixExpression -- create
                  | destroy UnaryExpression  -- destroy
                  | PostfixExpression
  PostfixExpression = PostfixExpression "?." identifier                  -- optionalMember
                    | PostfixExpression "." identifier                   -- member
                    | PostfixExpression "(" ListOf<Argument, ","> ")"    -- invocation
                    | PostfixExpression "[" Expression "]"               -- index
                    | PostfixExpression "!" ~"="                         -- force
                    | PrimaryExpression
  PrimaryExpression = "(" Expression ")"                  -- parenthesized
                    | "[" ListOf<Expression, ","> "]"     -- array
                    | literal
                    | identifier
  Argument = identifier ":" Expression  -- labeled
           | Expression                 -- unlabeled

  equalityOperator = "==" | "!="
  relationalOperator = "<=" | ">=" | "<" ~"-" | ">"
  additiveOperator = "+" | "-"
  multiplicativeOperator = "*" | "/" | "%"

  // Type annotations
  TypeAnnotation = "@"? Type
  Type = Type "?"  -- optional
       | BaseType
  BaseType = "[" TypeAnnotation ";" integerLiteral "]"       -- constantSized
           | "[" TypeAnnotation "]"                          -- variableSized
           | "{" TypeAnnotation ":" TypeAnnotation "}"       -- dictionary
           | auth "&" Type                                   -- authorizedReference
           | "&" Type                                        -- reference
           | NominalType
  NominalType = NonemptyListOf<identifier, ".">

  // Literals
  literal = fixedLiteral | integerLiteral | stringLiteral | boolLiteral | nilLiteral | pathLiteral
  fixedLiteral = digit+ "." digit+
  integerLiteral = "0x" hexDigit+  -- hex
                 | digit+          -- decimal
  stringLiteral = "\"" stringCharacter* "\""
  stringCharacter = "\\" any  -- escaped
                  | ~("\"" | "\n") any  -- plain
  boolLiteral = true | false
  nilLiteral = nil
  pathLiteral = "/" pathDomain "/" identifier
  pathDomain = "storage" | "private" | "public"

  // Identifiers and keywords
  specialFunctionName = destroy | identifier
  identifier = ~keyword identifierStart identifierPart*
  identifierStart = letter | "_"
  identifierPart = alnum | "_"

  compositeKind = struct | resource | contract | event | enum
  variableKind = let | var

  keyword = access | auth | case | contract | create | destroy | enum | event | false
          | fun | interface | let | nil | post | pre | priv | pub | resource | return
          | struct | true | var

  access = "access" ~identifierPart
  auth = "auth" ~identifierPart
  case = "case" ~identifierPart
  contract = "contract" ~identifierPart
  create = "create" ~identifierPart
  destroy = "destroy" ~identifierPart
  enum = "enum" ~identifierPart
  event = "event" ~identifierPart
  false = "false" ~identifierPart
  fun = "fun" ~identifierPart
  interface = "interface" ~identifierPart
  let = "let" ~identifierPart
  nil = "nil" ~identifierPart
  post = "post" ~identifierPart
  pre = "pre" ~identifierPart
  priv = "priv" ~identifierPart
  pub = "pub" ~identifierPart
  resource = "resource" ~identifierPart
  return = "return" ~identifierPart
  struct = "struct" ~identifierPart
  true = "true" ~identifierPart
  var = "var" ~identifierPart

  space += comment
  comment = "//" (~"\n" any)*              -- line
          | "/*" (~"*/" any)* "*/"         -- block
}
`

/**
 * The compiled Lode grammar.
 */
export const LodeGrammar = ohm.grammar(grammarSource)

/**
 * Match source against the grammar without building an AST.
 */
export function match(source: string): ohm.MatchResult {
	return LodeGrammar.match(source)
}
